// Reference roll call
// Fixed at startup, never mutated

export const REFERENCE_LABELS: readonly string[] = Object.freeze([
  'Þorinn',
  'Balin',
  'Bífurr',
  'Báfurr',
  'Bömburr',
  'Dóri',
  'Dvalinn',
  'Fíli',
  'Glóinn',
  'Kíli',
  'Nóri',
  'Þrainn',
  'Óri',
  'Gandalfr',
]);

// Trailing space is part of the prefix
export const ANNOUNCEMENT_PREFIX = 'Hi! My name is ';
