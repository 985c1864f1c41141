import type { CSSProperties } from "react";
import type { Segment } from "@/parser/markup";
import type { StyleDefinition, StyleRegistry } from "./registry";
import { debug } from "@/utils/debug";

export interface StyledSpan {
  text: string;
  tags: string[];
  style: CSSProperties;
  className?: string;
  markers: string[];
}

export interface ResolveOptions {
  onUnknownTag?: (tag: string) => void;
}

function warnUnknownTag(tag: string) {
  debug.warn(`Unknown style tag "${tag}", using the default style`);
}

/**
 * Builds the display spans for compiled segments. Each span starts from the
 * default style and layers its tags on top in directive order, so a later
 * tag wins when two set the same property.
 */
export function resolveSpans(
  segments: Segment[],
  registry: StyleRegistry,
  options: ResolveOptions = {},
): StyledSpan[] {
  const onUnknownTag = options.onUnknownTag ?? warnUnknownTag;
  const reported = new Set<string>();

  return segments.map((segment) => {
    const definitions: StyleDefinition[] = [registry.getDefault()];

    for (const tag of segment.tags) {
      if (!registry.has(tag) && !reported.has(tag)) {
        reported.add(tag);
        onUnknownTag(tag);
      }
      definitions.push(registry.getOrDefault(tag));
    }

    const classNames: string[] = [];
    const markers: string[] = [];
    let style: CSSProperties = {};

    for (const definition of definitions) {
      if (definition.style) {
        style = { ...style, ...definition.style };
      }
      for (const name of definition.className?.split(/\s+/) ?? []) {
        if (name && !classNames.includes(name)) classNames.push(name);
      }
      for (const marker of definition.markers ?? []) {
        if (!markers.includes(marker)) markers.push(marker);
      }
    }

    const span: StyledSpan = {
      text: segment.text,
      tags: segment.tags,
      style,
      markers,
    };
    if (classNames.length > 0) {
      span.className = classNames.join(" ");
    }
    return span;
  });
}
