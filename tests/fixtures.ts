import fs from 'fs-extra';
import os from 'os';
import path from 'path';

export const TWO_FILES_LCOV = `SF:lib/a.dart
DA:1,1
DA:2,0
LF:2
LH:1
end_of_record
SF:lib/b.dart
DA:1,3
LF:1
LH:1
end_of_record
`;

export const FULL_RECORD_LCOV = `TN:
SF:/home/ci/work/packages/app/src/server.ts
FN:3,start
FNDA:2,start
FNF:4
FNH:3
DA:3,2
DA:4,2
DA:9,0
BRDA:4,0,0,1
BRDA:4,0,1,0
BRF:2
BRH:1
LF:3
LH:2
end_of_record
`;

export async function makeTempDir(prefix = 'scopecov-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** LCOV text with `records` files of `linesPerRecord` DA lines each; 50,000 × 20 is a little over 10 MB. */
export function generateLcov(records: number, linesPerRecord: number): string {
  const out: string[] = [];
  for (let r = 0; r < records; r++) {
    out.push(`SF:packages/app/src/features/module-${r % 100}/component-${r}.ts`);
    let hit = 0;
    for (let l = 1; l <= linesPerRecord; l++) {
      const count = (r + l) % 7;
      if (count > 0) hit++;
      out.push(`DA:${l * 3},${count}`);
    }
    out.push(`LF:${linesPerRecord}`, `LH:${hit}`, 'end_of_record');
  }
  return out.join('\n') + '\n';
}
