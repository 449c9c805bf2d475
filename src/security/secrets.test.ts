import { describe, expect, it } from "vitest";
import { hasSecret, maskSecrets, redactSecret, secureCompare } from "./secrets.js";

describe("redactSecret", () => {
  it("keeps the head and tail of long values", () => {
    expect(redactSecret("  test-secret-value ")).toBe("test-...alue");
  });

  it("hides short values entirely", () => {
    expect(redactSecret("short")).toBe("********");
  });
});

describe("hasSecret", () => {
  it("treats blank values as absent", () => {
    expect(hasSecret(undefined)).toBe(false);
    expect(hasSecret("   ")).toBe(false);
    expect(hasSecret("test-secret")).toBe(true);
  });
});

describe("maskSecrets", () => {
  it("masks credential fields in JSON", () => {
    const text = JSON.stringify({ access_token: "test-secret", method: "user.current" });
    expect(maskSecrets(text)).toBe('{"access_token":"***","method":"user.current"}');
  });

  it("masks credentials in query strings", () => {
    expect(maskSecrets("POST /rest/user.current?auth=test-secret&x=1")).toBe(
      "POST /rest/user.current?auth=***&x=1",
    );
  });

  it("masks keys in any letter case", () => {
    expect(maskSecrets('{"ACCESS_TOKEN":"test-secret","Auth":"other-secret"}')).toBe(
      '{"ACCESS_TOKEN":"***","Auth":"***"}',
    );
    expect(maskSecrets("/rest/user.current?AUTH=test-secret&Refresh_Token=test-refresh")).toBe(
      "/rest/user.current?AUTH=***&Refresh_Token=***",
    );
  });

  it("leaves other text alone", () => {
    expect(maskSecrets('{"title":"auth"}')).toBe('{"title":"auth"}');
  });
});

describe("secureCompare", () => {
  it("matches equal strings only", () => {
    expect(secureCompare("test-secret", "test-secret")).toBe(true);
    expect(secureCompare("test-secret", "test-secreT")).toBe(false);
    expect(secureCompare("test-secret", "test")).toBe(false);
  });

  it("never matches a missing side", () => {
    expect(secureCompare(null, "test-secret")).toBe(false);
    expect(secureCompare(undefined, undefined)).toBe(false);
  });
});
