import type { CSSProperties } from "react";

export interface StyleDefinition {
  style?: CSSProperties;
  className?: string;
  // Free-form labels copied onto every span that uses this style
  markers?: readonly string[];
}

export type StyleEntries =
  | Iterable<readonly [string, StyleDefinition]>
  | Record<string, StyleDefinition>;

/** The tag holding the style every span starts from. */
export const DEFAULT_TAG = "";

const EMPTY_DEFINITION: StyleDefinition = {};

function isEntryIterable(
  styles: StyleEntries,
): styles is Iterable<readonly [string, StyleDefinition]> {
  return Symbol.iterator in styles;
}

function entriesOf(
  styles: StyleEntries,
): Iterable<readonly [string, StyleDefinition]> {
  return isEntryIterable(styles) ? styles : Object.entries(styles);
}

/**
 * Immutable mapping from tag names to style definitions. Every update returns
 * a new registry, so React can tell when styles change.
 */
export class StyleRegistry {
  private readonly styles: ReadonlyMap<string, StyleDefinition>;

  private constructor(styles: ReadonlyMap<string, StyleDefinition>) {
    this.styles = styles;
  }

  static create(styles?: StyleEntries): StyleRegistry {
    const registry = new StyleRegistry(
      new Map([[DEFAULT_TAG, EMPTY_DEFINITION]]),
    );
    return styles ? registry.withStyles(styles) : registry;
  }

  get size(): number {
    return this.styles.size;
  }

  has(tag: string): boolean {
    return this.styles.has(tag.trim());
  }

  get(tag: string): StyleDefinition | undefined {
    return this.styles.get(tag.trim());
  }

  getDefault(): StyleDefinition {
    return this.styles.get(DEFAULT_TAG) ?? EMPTY_DEFINITION;
  }

  /** Looks up `tag`, falling back to the default style when it is missing. */
  getOrDefault(tag: string): StyleDefinition {
    return this.get(tag) ?? this.getDefault();
  }

  tags(): string[] {
    return [...this.styles.keys()];
  }

  withStyle(tag: string, definition: StyleDefinition): StyleRegistry {
    return this.withStyles([[tag, definition]]);
  }

  withStyles(styles: StyleEntries): StyleRegistry {
    const next = new Map(this.styles);
    for (const [tag, definition] of entriesOf(styles)) {
      next.set(tag.trim(), definition);
    }
    return new StyleRegistry(next);
  }

  withDefault(definition: StyleDefinition): StyleRegistry {
    return this.withStyle(DEFAULT_TAG, definition);
  }

  /** Removes `tag`. Removing the default tag resets it to an empty style. */
  without(tag: string): StyleRegistry {
    const key = tag.trim();
    if (key === DEFAULT_TAG) {
      return this.withDefault(EMPTY_DEFINITION);
    }
    if (!this.styles.has(key)) {
      return this;
    }
    const next = new Map(this.styles);
    next.delete(key);
    return new StyleRegistry(next);
  }
}
