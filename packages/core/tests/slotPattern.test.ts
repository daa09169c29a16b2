import {
  buildSlotPattern,
  compileCustomPattern,
  isMatchPolicy,
} from '../src/rewriter/SlotPattern.js';
import { rewriteLine } from '../src/rewriter/LineRewriter.js';
import { ConfigError } from '../src/types/Errors.js';

const generic = buildSlotPattern('generic');
const named = buildSlotPattern('named');

test('keeps indentation and the resource expression', () => {
  expect(rewriteLine('  ps-t0 = ResourceFaceDiffuse.normal', generic)).toBe(
    '  this = ResourceFaceDiffuse.normal'
  );
  expect(rewriteLine('\tps-t12 = ResourceFaceHeadDiffuse', generic)).toBe(
    '\tthis = ResourceFaceHeadDiffuse'
  );
});

test('matches without spaces around the equals sign under both policies', () => {
  const line = 'ps-t3=ResourceSomeFaceHeadNormalMap.1024';
  expect(rewriteLine(line, generic)).toBe('this = ResourceSomeFaceHeadNormalMap.1024');
  expect(rewriteLine(line, named)).toBe('this = ResourceSomeFaceHeadNormalMap.1024');
});

test('named policy only accepts the four known suffixes', () => {
  expect(rewriteLine('ps-t1 = ResourceFaceADiffuse', named)).toBeNull();
  expect(rewriteLine('ps-t1 = ResourceFaceADiffuse', generic)).toBe('this = ResourceFaceADiffuse');
  expect(rewriteLine('ps-t2 = ResourceKleeFaceNormalMap', named)).toBe(
    'this = ResourceKleeFaceNormalMap'
  );
});

test('matches case-insensitively and ignores trailing whitespace', () => {
  expect(rewriteLine('PS-T2 = resourcefacenormalmap', generic)).toBe(
    'this = resourcefacenormalmap'
  );
  expect(rewriteLine('ps-t0 = ResourceFaceDiffuse   ', generic)).toBe(
    'this = ResourceFaceDiffuse'
  );
});

test('leaves other lines alone', () => {
  expect(rewriteLine('this = ResourceFaceDiffuse', generic)).toBeNull();
  expect(rewriteLine('ps-t0 = ResourceBodyDiffuse', generic)).toBeNull();
  expect(rewriteLine('ps-t0 = ResourceFaceDiffuse ; note', generic)).toBeNull();
  expect(rewriteLine('vs-t0 = ResourceFaceDiffuse', generic)).toBeNull();
  expect(rewriteLine('ps-t = ResourceFaceDiffuse', generic)).toBeNull();
  expect(rewriteLine('ps-t0 = FaceDiffuse', generic)).toBeNull();
});

test('custom pattern uses its first group as the resource', () => {
  const custom = compileCustomPattern(String.raw`^\s*ps-t\d+\s*=\s*(Resource\w*Eye\w*)\s*$`);
  expect(rewriteLine('  ps-t5 = ResourceEyeDiffuse', custom)).toBe('  this = ResourceEyeDiffuse');
  expect(rewriteLine('ps-t5 = ResourceFaceDiffuse', custom)).toBeNull();
});

test('custom pattern must compile and capture', () => {
  expect(() => compileCustomPattern(String.raw`ps-t\d+`)).toThrow(ConfigError);
  expect(() => compileCustomPattern('(?:Face)')).toThrow(ConfigError);
  expect(() => compileCustomPattern('(')).toThrow(ConfigError);
  expect(() => buildSlotPattern('custom')).toThrow(ConfigError);
});

test('isMatchPolicy recognises the policies', () => {
  expect(isMatchPolicy('named')).toBe(true);
  expect(isMatchPolicy('generic')).toBe(true);
  expect(isMatchPolicy('custom')).toBe(true);
  expect(isMatchPolicy('strict')).toBe(false);
});
