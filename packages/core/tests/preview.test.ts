import { formatPreview } from '../src/rewriter/Preview.js';
import type { Highlighter } from '../src/rewriter/Preview.js';

const match = {
  lineNumber: 3,
  original: '  ps-t0 = ResourceFaceDiffuse',
  rewritten: '  this = ResourceFaceDiffuse',
};

test('formats a plain preview', () => {
  expect(formatPreview('mods/face.ini', [match])).toEqual([
    "Preview changes for 'mods/face.ini':",
    "  Line 3: '  ps-t0 = ResourceFaceDiffuse' → '  this = ResourceFaceDiffuse'",
  ]);
});

test('highlights the slot name and the this keyword', () => {
  const brackets: Highlighter = {
    slot: (text) => `[${text}]`,
    keyword: (text) => `<${text}>`,
  };
  expect(formatPreview('face.ini', [match], brackets)[1]).toBe(
    "  Line 3: '  [ps-t0] = ResourceFaceDiffuse' → '  <this> = ResourceFaceDiffuse'"
  );
});

test('only the leading this is highlighted', () => {
  const stars: Highlighter = { slot: (text) => text, keyword: (text) => `*${text}*` };
  const lines = formatPreview('face.ini', [
    {
      lineNumber: 1,
      original: 'ps-t9 = ResourcethisFaceDiffuse',
      rewritten: 'this = ResourcethisFaceDiffuse',
    },
  ], stars);
  expect(lines[1]).toBe(
    "  Line 1: 'ps-t9 = ResourcethisFaceDiffuse' → '*this* = ResourcethisFaceDiffuse'"
  );
});
