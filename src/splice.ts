export interface SpliceMarkers {
  readonly start: string;
  readonly end: string;
}

export const HTML_MARKERS: SpliceMarkers = {
  start: '<!-- start options doc (DO NOT EDIT BY HAND) -->',
  end: '<!-- end options doc -->',
};

/** The markers as they appear inside a documentation comment. */
export function commentMarkers(markers: SpliceMarkers = HTML_MARKERS): SpliceMarkers {
  return { start: `* ${markers.start}`, end: `* ${markers.end}` };
}

export type SpliceStatus = 'replaced' | 'unterminated' | 'missing';

export interface SpliceResult {
  readonly text: string;
  readonly status: SpliceStatus;
}

/**
 * Replace the lines between the first start marker and the next end marker
 * with `block`. Both marker lines are kept; everything outside them is copied
 * unchanged.
 *
 * Without a start marker the document is returned as is. Without an end
 * marker after it, the block is inserted after the start marker and no
 * original line is dropped.
 *
 * `block` may be computed from the start marker line, e.g. to match its
 * indentation.
 */
export function splice(
  document: string,
  block: string | ((startLine: string) => string),
  markers: SpliceMarkers = HTML_MARKERS,
): SpliceResult {
  const lines = document.split('\n');
  const start = lines.findIndex((line) => line.trim() === markers.start);
  if (start === -1) {
    return { text: document, status: 'missing' };
  }

  const startLine = lines[start] ?? '';
  const rendered = typeof block === 'function' ? block(startLine) : block;

  const after = lines.slice(start + 1);
  const end = after.findIndex((line) => line.trim() === markers.end);
  const kept = end === -1 ? after : after.slice(end);

  return {
    text: [...lines.slice(0, start + 1), rendered, ...kept].join('\n'),
    status: end === -1 ? 'unterminated' : 'replaced',
  };
}
