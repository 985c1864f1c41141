import type { CSSProperties } from "react";
import { useRichText } from "@/hooks/useRichText";

interface RichTextProps {
  markup: string;
  className?: string;
  style?: CSSProperties;
  strict?: boolean;
}

const wrapperStyle: CSSProperties = { whiteSpace: "pre-wrap" };

export function RichText({ markup, className, style, strict }: RichTextProps) {
  const spans = useRichText(markup, { strict });

  return (
    <span
      className={className ? `rich-text ${className}` : "rich-text"}
      style={{ ...wrapperStyle, ...style }}
    >
      {spans.map((span, index) => (
        <span
          key={index}
          className={span.className}
          style={span.style}
          data-tags={span.tags.join(",")}
          data-markers={
            span.markers.length > 0 ? span.markers.join(" ") : undefined
          }
        >
          {span.text}
        </span>
      ))}
    </span>
  );
}
