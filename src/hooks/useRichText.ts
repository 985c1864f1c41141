import { useMemo } from "react";
import { compile } from "@/parser/markup";
import { isMalformedMarkupError } from "@/errors";
import { StyleRegistry } from "@/styles/registry";
import { resolveSpans, type StyledSpan } from "@/styles/resolve";
import { useOptionalStyleRegistry } from "@/contexts/StyleRegistryContext";
import { debug } from "@/utils/debug";

export interface UseRichTextOptions {
  /** Overrides the provider's malformed-markup policy. */
  strict?: boolean;
}

const EMPTY_REGISTRY = StyleRegistry.create();

export function useRichText(
  markup: string,
  options: UseRichTextOptions = {},
): StyledSpan[] {
  const context = useOptionalStyleRegistry();
  const registry = context?.registry ?? EMPTY_REGISTRY;
  const strict = options.strict ?? context?.strict ?? false;

  return useMemo(() => {
    try {
      return resolveSpans(compile(markup), registry);
    } catch (error) {
      if (strict || !isMalformedMarkupError(error)) {
        throw error;
      }
      debug.error("Failed to parse rich text markup", {
        input: error.input,
        offset: error.offset,
      });
      // Show the markup as written rather than dropping it
      return resolveSpans([{ text: markup, tags: [] }], registry);
    }
  }, [markup, registry, strict]);
}
