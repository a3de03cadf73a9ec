/**
 * Sentence segmentation for paced content delivery.
 *
 * A chunk ends after a run of terminators: full-width 。！？ always, ASCII .!?
 * only before whitespace or end of text (so "3.14" stays whole). Whitespace
 * after a terminator stays with the chunk it follows, so joining the chunks
 * gives back the input exactly.
 */

const FULL_WIDTH = new Set(['。', '！', '？']);
const ASCII = new Set(['.', '!', '?']);
const WHITESPACE = /\s/;

export interface ContentChunk {
  content: string;
  isFinal: boolean;
}

export function splitSentences(text: string): string[] {
  if (text === '') return [''];

  const chunks: string[] = [];
  let start = 0;
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);
    let end = -1;

    if (FULL_WIDTH.has(ch)) {
      end = i + 1;
      while (end < text.length && FULL_WIDTH.has(text.charAt(end))) end++;
    } else if (ASCII.has(ch)) {
      let j = i + 1;
      while (j < text.length && ASCII.has(text.charAt(j))) j++;
      if (j < text.length && !WHITESPACE.test(text.charAt(j))) {
        i = j;
        continue;
      }
      end = j;
    }

    if (end === -1) {
      i++;
      continue;
    }
    while (end < text.length && WHITESPACE.test(text.charAt(end))) end++;
    chunks.push(text.slice(start, end));
    start = end;
    i = end;
  }

  if (start < text.length) {
    const rest = text.slice(start);
    const last = chunks.length - 1;
    if (last >= 0 && rest.trim() === '') chunks[last] += rest;
    else chunks.push(rest);
  }
  return chunks;
}

export function chunkContent(text: string): ContentChunk[] {
  const sentences = splitSentences(text);
  return sentences.map((content, index) => ({ content, isFinal: index === sentences.length - 1 }));
}
