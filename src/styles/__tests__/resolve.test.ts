import { describe, it, expect, vi } from "vitest";
import { resolveSpans } from "../resolve";
import { StyleRegistry } from "../registry";
import { compile } from "@/parser/markup";

const registry = StyleRegistry.create({
  lg: { style: { fontSize: 40 }, className: "text-lg" },
  fancy: {
    style: { color: "red", fontStyle: "italic" },
    className: "fancy text-lg",
    markers: ["fancy-text"],
  },
  blue: { style: { color: "blue" }, markers: ["fancy-text", "wave"] },
});

describe("resolveSpans", () => {
  it("should give untagged text the default style", () => {
    const spans = resolveSpans(
      compile("plain"),
      registry.withDefault({ style: { color: "gray" }, className: "base" }),
    );

    expect(spans).toEqual([
      {
        text: "plain",
        tags: [],
        style: { color: "gray" },
        className: "base",
        markers: [],
      },
    ]);
  });

  it("should merge tag styles in directive order", () => {
    const spans = resolveSpans(compile("[lg]Hello [lg,fancy]World"), registry);

    expect(spans).toEqual([
      {
        text: "Hello ",
        tags: ["lg"],
        style: { fontSize: 40 },
        className: "text-lg",
        markers: [],
      },
      {
        text: "World",
        tags: ["lg", "fancy"],
        style: { fontSize: 40, color: "red", fontStyle: "italic" },
        className: "text-lg fancy",
        markers: ["fancy-text"],
      },
    ]);
  });

  it("should let later tags override earlier properties", () => {
    const [span] = resolveSpans(compile("[fancy,blue]x"), registry);

    expect(span.style).toEqual({ color: "blue", fontStyle: "italic" });
    expect(span.markers).toEqual(["fancy-text", "wave"]);
  });

  it("should layer tags over the default style", () => {
    const [span] = resolveSpans(
      compile("[blue]x"),
      registry.withDefault({ style: { color: "gray", fontWeight: 500 } }),
    );

    expect(span.style).toEqual({ color: "blue", fontWeight: 500 });
  });

  it("should omit className when no style sets one", () => {
    const [span] = resolveSpans(compile("[blue]x"), registry);

    expect(span).not.toHaveProperty("className");
  });

  it("should report unknown tags once and use the default style", () => {
    const onUnknownTag = vi.fn();
    const spans = resolveSpans(compile("[nope]a[nope,lg]b"), registry, {
      onUnknownTag,
    });

    expect(onUnknownTag).toHaveBeenCalledTimes(1);
    expect(onUnknownTag).toHaveBeenCalledWith("nope");
    expect(spans[0].style).toEqual({});
    expect(spans[1].style).toEqual({ fontSize: 40 });
  });

  it("should return no spans for no segments", () => {
    expect(resolveSpans([], registry)).toEqual([]);
  });
});
