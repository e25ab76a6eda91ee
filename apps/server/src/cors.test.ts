import { describe, it, expect } from "vitest";
import { corsHeaders, resolveAllowedOrigin } from "./cors";

describe("resolveAllowedOrigin", () => {
  it("allows any origin with a wildcard", () => {
    expect(resolveAllowedOrigin(["*"], "https://viewer.example")).toBe("*");
    expect(resolveAllowedOrigin(["*"], undefined)).toBe("*");
  });

  it("echoes a listed origin", () => {
    expect(resolveAllowedOrigin(["https://a.example", "https://b.example"], "https://b.example")).toBe(
      "https://b.example",
    );
  });

  it("refuses an unlisted origin", () => {
    expect(resolveAllowedOrigin(["https://a.example"], "https://evil.example")).toBeNull();
    expect(resolveAllowedOrigin(["https://a.example"], undefined)).toBeNull();
  });
});

describe("corsHeaders", () => {
  it("adds Vary when echoing a specific origin", () => {
    expect(corsHeaders(["https://a.example"], "https://a.example")).toEqual({
      "Access-Control-Allow-Origin": "https://a.example",
      "Access-Control-Allow-Methods": "GET, OPTIONS",
      "Access-Control-Allow-Headers": "Content-Type",
      Vary: "Origin",
    });
  });

  it("sends nothing for a refused origin", () => {
    expect(corsHeaders(["https://a.example"], "https://evil.example")).toEqual({});
  });
});
