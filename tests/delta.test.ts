import { describe, expect, it } from 'vitest';
import { calculateCoverageDelta } from '../src/lib/delta.js';
import { parseLcovContent } from '../src/lib/lcov.js';

const BASE = `SF:a.ts
DA:1,1
DA:2,0
DA:3,5
end_of_record
SF:gone.ts
DA:1,1
end_of_record
`;

const CURRENT = `SF:a.ts
DA:1,1
DA:2,4
DA:3,2
DA:4,0
end_of_record
SF:b.ts
DA:1,1
LF:1
LH:1
end_of_record
`;

describe('calculateCoverageDelta', () => {
  const delta = calculateCoverageDelta(parseLcovContent(BASE), parseLcovContent(CURRENT));

  it('reports signed hit count changes and new lines', () => {
    const a = delta.files.find((f) => f.path === 'a.ts');
    expect(a?.lines).toEqual([
      { lineNumber: 2, hitCount: 4 },
      { lineNumber: 3, hitCount: -3 },
      { lineNumber: 4, hitCount: 0 },
    ]);
    expect(a?.summary).toEqual({
      linesFound: 3,
      linesHit: 1,
      functionsFound: 0,
      functionsHit: 0,
      branchesFound: 0,
      branchesHit: 0,
    });
  });

  it('carries files missing from the baseline over unchanged', () => {
    const b = delta.files.find((f) => f.path === 'b.ts');
    expect(b).toEqual(parseLcovContent(CURRENT).files[1]);
  });

  it('leaves out files that only exist in the baseline', () => {
    expect(delta.files.map((f) => f.path)).toEqual(['a.ts', 'b.ts']);
  });

  it('sums the delta files into the corpus summary', () => {
    expect(delta.summary.linesFound).toBe(4);
    expect(delta.summary.linesHit).toBe(2);
  });

  it('drops files whose lines did not change', () => {
    const same = parseLcovContent(BASE);
    expect(calculateCoverageDelta(same, same).files).toEqual([]);
  });
});
