export { compile, tokenize, parseTagList } from "./parser/markup";
export type { Segment, MarkupToken } from "./parser/markup";
export { MalformedMarkupError, isMalformedMarkupError } from "./errors";
export { StyleRegistry, DEFAULT_TAG } from "./styles/registry";
export type { StyleDefinition, StyleEntries } from "./styles/registry";
export { resolveSpans } from "./styles/resolve";
export type { StyledSpan, ResolveOptions } from "./styles/resolve";
export {
  StyleRegistryProvider,
  useStyleRegistry,
} from "./contexts/StyleRegistryContext";
export { useRichText } from "./hooks/useRichText";
export type { UseRichTextOptions } from "./hooks/useRichText";
export { RichText } from "./components/RichText";
export { ErrorBoundary } from "./components/ErrorBoundary";
