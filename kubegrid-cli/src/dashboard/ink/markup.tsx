/**
 * Stack-based parser turning pane markup into styled Ink spans.
 *
 * Supports: {bold}, {underline}, {inverse}, {color-fg}, {color-bg}, {/tag}
 * (pops the innermost style), nested tags, and {open}/{close} for literal
 * braces. Unknown tags are dropped.
 */

import React from 'react';
import { Text } from 'ink';

export interface Span {
  text: string;
  bold?: boolean;
  underline?: boolean;
  inverse?: boolean;
  color?: string;
  backgroundColor?: string;
}

type Style = Omit<Span, 'text'>;

const TAG_RE = /\{(\/?)([^{}]+)\}/g;

function mapColor(c: string): string {
  return c === 'grey' ? 'gray' : c;
}

function sameStyle(a: Style, b: Style): boolean {
  return a.bold === b.bold
    && a.underline === b.underline
    && a.inverse === b.inverse
    && a.color === b.color
    && a.backgroundColor === b.backgroundColor;
}

/** Splits one line of markup into spans; adjacent spans of equal style are merged. */
export function parseMarkup(input: string): Span[] {
  const spans: Span[] = [];
  const stack: Style[] = [{}];
  const current = (): Style => stack[stack.length - 1];

  const emit = (text: string): void => {
    if (!text) return;
    const style = current();
    const last = spans[spans.length - 1];
    if (last && sameStyle(last, style)) {
      last.text += text;
    } else {
      spans.push({ text, ...style });
    }
  };

  let lastIndex = 0;
  TAG_RE.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = TAG_RE.exec(input)) !== null) {
    emit(input.slice(lastIndex, match.index));
    lastIndex = match.index + match[0].length;

    const [, slash, tag] = match;
    if (slash) {
      if (stack.length > 1) stack.pop();
    } else if (tag === 'open') {
      emit('{');
    } else if (tag === 'close') {
      emit('}');
    } else if (tag === 'bold') {
      stack.push({ ...current(), bold: true });
    } else if (tag === 'underline') {
      stack.push({ ...current(), underline: true });
    } else if (tag === 'inverse') {
      stack.push({ ...current(), inverse: true });
    } else if (tag.endsWith('-fg')) {
      stack.push({ ...current(), color: mapColor(tag.slice(0, -3)) });
    } else if (tag.endsWith('-bg')) {
      stack.push({ ...current(), backgroundColor: mapColor(tag.slice(0, -3)) });
    }
  }
  emit(input.slice(lastIndex));
  return spans;
}

/** One line of markup as Ink nodes. */
export function renderMarkup(input: string): React.ReactNode {
  if (!input) return null;
  if (!input.includes('{')) return input;
  return parseMarkup(input).map((span, i) => {
    const { text, ...style } = span;
    return <Text key={i} {...style}>{text}</Text>;
  });
}
