/**
 * Inline flow
 *
 * Lays a sequence of atoms (words, images, zero-size anchors) into lines of a
 * fixed width. Used for standalone text, links and alt text as well as for
 * `inline` items, which flow all of their descendants as one running sequence.
 *
 * Line Breaking Strategy:
 * - Greedy: words are added while the candidate line still fits
 * - A run of words from one segment is measured as a whole candidate string
 * - Whitespace between segments becomes a single space in the incoming font
 * - A word wider than the line is kept on a line of its own
 * - Each line is as tall as its tallest atom; atoms are top-aligned
 */

import type { FontDescriptor } from '@folio/contracts';
import type { MeasurementContext } from './measurement.js';

export type FlowSegment =
  | { kind: 'words'; owner: number; text: string; font: FontDescriptor; lineHeight: number }
  | { kind: 'image'; owner: number; width: number; aspectRatio: number }
  | { kind: 'anchor'; owner: number };

/** A placed piece of a segment, relative to the flow's origin. */
export type FlowFragment = {
  kind: FlowSegment['kind'];
  owner: number;
  x: number;
  y: number;
  width: number;
  height: number;
  /** Words on this line; empty for images and anchors. */
  text: string;
};

export type FlowLayout = {
  fragments: FlowFragment[];
  lineCount: number;
  height: number;
};

const WHITESPACE_RUN = /(\s+)/;
const WHITESPACE_ONLY = /^\s+$/;

export const imageHeight = (width: number, aspectRatio: number): number => Math.round(width * aspectRatio);

/**
 * Flows `segments` into lines no wider than `width` (except for single atoms
 * that are wider on their own).
 */
export function flowSegments(segments: readonly FlowSegment[], width: number, measure: MeasurementContext): FlowLayout {
  const fragments: FlowFragment[] = [];
  let lineTop = 0;
  let lineStart = 0;
  let lineRight = 0;
  let lineHeight = 0;
  let lineHasContent = false;
  let lineCount = 0;
  let pendingSpace = false;
  let spaceFont: FontDescriptor | undefined;
  let open: { segment: number; fragment: FlowFragment } | undefined;

  const finishLine = (): void => {
    for (let i = lineStart; i < fragments.length; i += 1) {
      fragments[i].y = lineTop;
    }
    lineTop += lineHeight;
    lineCount += 1;
    lineStart = fragments.length;
    lineRight = 0;
    lineHeight = 0;
    lineHasContent = false;
    open = undefined;
  };

  const gapBefore = (font: FontDescriptor | undefined): number =>
    lineHasContent && pendingSpace && font ? measure.textWidth(' ', font) : 0;

  segments.forEach((segment, index) => {
    switch (segment.kind) {
      case 'words':
        for (const token of segment.text.split(WHITESPACE_RUN)) {
          if (token.length === 0) continue;
          if (WHITESPACE_ONLY.test(token)) {
            pendingSpace = true;
            continue;
          }

          const continuing = open !== undefined && open.segment === index ? open.fragment : undefined;
          let x = continuing ? continuing.x : lineRight + gapBefore(segment.font);
          let text = continuing ? `${continuing.text}${pendingSpace ? ' ' : ''}${token}` : token;
          let textWidth = measure.textWidth(text, segment.font);

          let target = continuing;
          if (lineHasContent && x + textWidth > width) {
            finishLine();
            x = 0;
            text = token;
            textWidth = measure.textWidth(token, segment.font);
            target = undefined;
          }

          if (target) {
            target.text = text;
            target.width = textWidth;
          } else {
            const fragment: FlowFragment = {
              kind: 'words',
              owner: segment.owner,
              x,
              y: 0,
              width: textWidth,
              height: segment.lineHeight,
              text,
            };
            fragments.push(fragment);
            open = { segment: index, fragment };
          }

          lineRight = x + textWidth;
          lineHeight = Math.max(lineHeight, segment.lineHeight);
          lineHasContent = true;
          pendingSpace = false;
          spaceFont = segment.font;
        }
        break;

      case 'image': {
        const drawnWidth = Math.min(segment.width, width);
        const height = imageHeight(drawnWidth, segment.aspectRatio);
        let x = lineRight + gapBefore(spaceFont);
        if (lineHasContent && x + drawnWidth > width) {
          finishLine();
          x = 0;
        }
        fragments.push({ kind: 'image', owner: segment.owner, x, y: 0, width: drawnWidth, height, text: '' });
        lineRight = x + drawnWidth;
        lineHeight = Math.max(lineHeight, height);
        lineHasContent = true;
        pendingSpace = false;
        open = undefined;
        break;
      }

      case 'anchor':
        fragments.push({ kind: 'anchor', owner: segment.owner, x: lineRight, y: 0, width: 0, height: 0, text: '' });
        break;

      default: {
        const _exhaustive: never = segment;
        return _exhaustive;
      }
    }
  });

  if (fragments.length > lineStart) finishLine();

  return { fragments, lineCount, height: lineTop };
}

/** Widest unbreakable atom of a flow, rounded up: its required width. */
export function widestAtom(segments: readonly FlowSegment[], measure: MeasurementContext): number {
  let widest = 0;
  for (const segment of segments) {
    switch (segment.kind) {
      case 'words':
        widest = Math.max(widest, measure.widestWord(segment.text, segment.font));
        break;
      case 'image':
        widest = Math.max(widest, segment.width);
        break;
      case 'anchor':
        break;
      default: {
        const _exhaustive: never = segment;
        return _exhaustive;
      }
    }
  }
  return widest;
}
