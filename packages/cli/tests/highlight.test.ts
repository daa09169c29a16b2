import { createColors, createHighlighter, isColorEnabled } from '../src/utils/highlight.js';

test('explicit modes ignore the terminal', () => {
  expect(isColorEnabled('always', { isTTY: false })).toBe(true);
  expect(isColorEnabled('never', { isTTY: true })).toBe(false);
});

test('auto mode needs a terminal', () => {
  expect(isColorEnabled('auto', { isTTY: false })).toBe(false);
  expect(isColorEnabled('auto', {})).toBe(false);
});

test('coloured highlighter paints the slot red and the keyword green', () => {
  const highlighter = createHighlighter(true);
  expect(highlighter.slot('ps-t0')).toBe('\u001b[91mps-t0\u001b[39m');
  expect(highlighter.keyword('this')).toBe('\u001b[92mthis\u001b[39m');
});

test('disabled colour leaves text alone', () => {
  expect(createHighlighter(false).slot('ps-t0')).toBe('ps-t0');
  expect(createColors(false).yellow('Skipping disabled file: a.ini')).toBe(
    'Skipping disabled file: a.ini'
  );
});
