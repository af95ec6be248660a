export class ScopecovError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends ScopecovError {
  readonly path: string;

  constructor(path: string) {
    super(`Coverage file not found: ${path}`);
    this.path = path;
  }
}

/** Raised by file discovery when no revision-control context can be established. */
export class VcsUnavailableError extends ScopecovError {
  readonly root: string;

  constructor(root: string, options?: { cause?: unknown }) {
    super(`Not a git repository (searched from: ${root})`, options);
    this.root = root;
  }
}

export class ParseWorkerError extends ScopecovError {}

export class ConfigError extends ScopecovError {}
