import { describe, it, expect } from "vitest";
import { DEFAULT_TAG, StyleRegistry } from "../registry";

describe("StyleRegistry", () => {
  it("should start with only an empty default style", () => {
    const registry = StyleRegistry.create();

    expect(registry.size).toBe(1);
    expect(registry.tags()).toEqual([DEFAULT_TAG]);
    expect(registry.getDefault()).toEqual({});
  });

  it("should seed styles from a record or from entries", () => {
    const red = { style: { color: "red" } };
    const fromRecord = StyleRegistry.create({ red });
    const fromEntries = StyleRegistry.create([["red", red]]);

    expect(fromRecord.get("red")).toBe(red);
    expect(fromEntries.get("red")).toBe(red);
    expect(fromEntries.tags()).toEqual(["", "red"]);
  });

  it("should not change the receiver when adding styles", () => {
    const base = StyleRegistry.create();
    const next = base.withStyle("lg", { style: { fontSize: 40 } });

    expect(base.has("lg")).toBe(false);
    expect(next.has("lg")).toBe(true);
    expect(next).not.toBe(base);
  });

  it("should replace a style registered under the same tag", () => {
    const registry = StyleRegistry.create({ red: { className: "a" } }).withStyle(
      "red",
      { className: "b" },
    );

    expect(registry.get("red")).toEqual({ className: "b" });
    expect(registry.size).toBe(2);
  });

  it("should trim tag names", () => {
    const registry = StyleRegistry.create({ " lg ": { className: "lg" } });

    expect(registry.tags()).toEqual(["", "lg"]);
    expect(registry.get(" lg")).toEqual({ className: "lg" });
  });

  it("should fall back to the default style for unknown tags", () => {
    const muted = { style: { color: "gray" } };
    const registry = StyleRegistry.create().withDefault(muted);

    expect(registry.getOrDefault("missing")).toBe(muted);
    expect(registry.get("missing")).toBeUndefined();
  });

  it("should remove styles", () => {
    const registry = StyleRegistry.create({ red: {}, blue: {} }).without("red");

    expect(registry.tags()).toEqual(["", "blue"]);
  });

  it("should return the same registry when removing an unknown tag", () => {
    const registry = StyleRegistry.create({ red: {} });

    expect(registry.without("blue")).toBe(registry);
  });

  it("should reset the default style instead of removing it", () => {
    const registry = StyleRegistry.create()
      .withDefault({ className: "base" })
      .without(DEFAULT_TAG);

    expect(registry.has(DEFAULT_TAG)).toBe(true);
    expect(registry.getDefault()).toEqual({});
  });
});
