export type OutputFormat = 'console' | 'json' | 'lcov';

export type ScopecovConfig = {
  packagePath: string;
  lcovFile: string;
  baseBranch?: string;
  outputDir: string;
  outputFormats: OutputFormat[];
  sourceExtensions: string[];
  exclude: string[];
  workerThresholdBytes: number;
};

export type JsonLine = { lineNumber: number; hitCount: number; isCovered: boolean };

export type JsonSummary = {
  linesFound: number;
  linesHit: number;
  functionsFound: number;
  functionsHit: number;
  branchesFound: number;
  branchesHit: number;
  linePercentage: number;
  functionPercentage: number;
  branchPercentage: number;
};

export type JsonReport = {
  summary: JsonSummary;
  files: { path: string; summary: JsonSummary; lines: JsonLine[] }[];
};
