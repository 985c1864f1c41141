import { MalformedMarkupError } from "@/errors";

export interface Segment {
  text: string;
  tags: string[];
}

export type MarkupToken =
  | { type: "text"; value: string; offset: number }
  | { type: "tags"; tags: string[]; offset: number };

/**
 * Splits the inside of a directive into tag names. Names are trimmed, empty
 * names dropped and repeats collapsed, keeping first-seen order.
 */
export function parseTagList(body: string): string[] {
  const tags: string[] = [];
  for (const raw of body.split(",")) {
    const tag = raw.trim();
    if (tag && !tags.includes(tag)) {
      tags.push(tag);
    }
  }
  return tags;
}

/**
 * Scans markup into text and directive tokens.
 *
 * `[[` and `]]` are literal brackets, and a `]` outside a directive is plain
 * text. Throws {@link MalformedMarkupError} for a `[` with no closing `]`.
 */
export function tokenize(input: string): MarkupToken[] {
  const tokens: MarkupToken[] = [];
  let text = "";
  let textOffset = 0;
  let i = 0;

  const flushText = () => {
    if (text) {
      tokens.push({ type: "text", value: text, offset: textOffset });
      text = "";
    }
  };

  const appendText = (value: string, at: number) => {
    if (!text) textOffset = at;
    text += value;
  };

  while (i < input.length) {
    const char = input[i];

    if (char === "[") {
      if (input[i + 1] === "[") {
        appendText("[", i);
        i += 2;
        continue;
      }

      const close = input.indexOf("]", i + 1);
      if (close === -1) {
        throw new MalformedMarkupError(input, i);
      }

      flushText();
      tokens.push({
        type: "tags",
        tags: parseTagList(input.slice(i + 1, close)),
        offset: i,
      });
      i = close + 1;
    } else if (char === "]") {
      appendText("]", i);
      // "]]" is one escaped bracket; a lone "]" is kept as is
      i += input[i + 1] === "]" ? 2 : 1;
    } else {
      appendText(char, i);
      i += 1;
    }
  }

  flushText();
  return tokens;
}

/**
 * Compiles markup into text segments, each paired with the tags of the
 * directive that precedes it. A directive replaces the active tags rather
 * than adding to them, so `[]` returns to unstyled text.
 */
export function compile(input: string): Segment[] {
  const segments: Segment[] = [];
  let activeTags: string[] = [];

  for (const token of tokenize(input)) {
    if (token.type === "tags") {
      activeTags = token.tags;
    } else {
      segments.push({ text: token.value, tags: [...activeTags] });
    }
  }

  return segments;
}
