import { describe, it, expect } from "vitest";
import { listTemplateNames, resolveTemplate } from "./templates.js";

describe("resolveTemplate", () => {
  it("lets an explicit palette override the template", () => {
    expect(resolveTemplate("professional", { palette: "ocean" })).toEqual({
      style: "grid",
      palette: "ocean",
      effects: ["shadow"],
    });
  });

  it("uses template values when nothing is overridden", () => {
    expect(resolveTemplate("creative")).toEqual({
      style: "geometric",
      palette: "sunset",
      effects: ["glow", "gradient"],
    });
  });

  it("lets explicit effects replace the template's effects", () => {
    expect(resolveTemplate("cyberpunk", { effects: ["blur"] }).effects).toEqual(["blur"]);
    expect(resolveTemplate("cyberpunk", { effects: [] }).effects).toEqual([]);
  });

  it("behaves as if no template were given for unknown names", () => {
    expect(resolveTemplate("does-not-exist", { style: "grid" })).toEqual({
      style: "grid",
      palette: "stealth",
      effects: [],
    });
  });

  it("falls back to defaults without a template", () => {
    expect(resolveTemplate(undefined)).toEqual({ style: "wave", palette: "stealth", effects: [] });
  });

  it("lists the built-in templates", () => {
    expect(listTemplateNames()).toEqual([
      "minimal",
      "professional",
      "creative",
      "tech",
      "nature",
      "cyberpunk",
    ]);
  });
});
