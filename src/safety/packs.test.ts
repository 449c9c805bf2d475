import { describe, expect, it } from "vitest";
import {
  availablePacks,
  expandAllowlist,
  isAllowed,
  parseMethodAllowlist,
  parsePackList,
} from "./packs.js";

describe("parsePackList", () => {
  it("defaults to core", () => {
    expect(parsePackList(undefined)).toEqual(["core"]);
    expect(parsePackList("  ")).toEqual(["core"]);
  });

  it("selects nothing for none", () => {
    expect(parsePackList("none")).toEqual([]);
  });

  it("lowercases and de-duplicates in order", () => {
    expect(parsePackList("Comms, core,comms")).toEqual(["comms", "core"]);
  });

  it("rejects an unknown pack and lists the available ones", () => {
    expect(() => parsePackList("core,bogus")).toThrow(
      "unknown pack 'bogus', available packs: automation, boards, collab, commerce, comms, compliance, content, core, diagnostics, platform, services, sites",
    );
  });
});

describe("availablePacks", () => {
  it("lists twelve packs", () => {
    expect(availablePacks()).toHaveLength(12);
  });
});

describe("parseMethodAllowlist", () => {
  it("defaults to batch only", () => {
    expect(parseMethodAllowlist(undefined)).toEqual(["batch"]);
    expect(parseMethodAllowlist(" , ")).toEqual(["batch"]);
  });

  it("splits and lowercases patterns", () => {
    expect(parseMethodAllowlist("User.*, crm.lead.list")).toEqual([
      "user.*",
      "crm.lead.list",
    ]);
  });
});

describe("expandAllowlist", () => {
  it("appends pack patterns after the base list without duplicates", () => {
    expect(expandAllowlist(["batch", "disk.*"], ["boards", "content"])).toEqual([
      "batch",
      "disk.*",
      "tasks.api.scrum.*",
      "tasks.scrum.*",
      "file.*",
      "files.*",
      "documentgenerator.*",
    ]);
  });

  it("merges overlapping packs once", () => {
    const merged = expandAllowlist([], ["collab", "services"]);
    expect(merged.filter((p) => p === "calendar.*")).toHaveLength(1);
  });
});

describe("isAllowed", () => {
  const patterns = expandAllowlist(["batch"], ["core", "diagnostics"]);

  it("matches globs across dotted segments", () => {
    expect(isAllowed("crm.lead.list", patterns)).toBe(true);
    expect(isAllowed("crm.item.productrow.set", patterns)).toBe(true);
    expect(isAllowed("CRM.Lead.Add", patterns)).toBe(true);
  });

  it("matches exact entries", () => {
    expect(isAllowed("batch", patterns)).toBe(true);
    expect(isAllowed("server.time", patterns)).toBe(true);
    expect(isAllowed("methods", patterns)).toBe(true);
  });

  it("refuses methods outside every pattern", () => {
    expect(isAllowed("disk.file.delete", patterns)).toBe(false);
    expect(isAllowed("crm", patterns)).toBe(false);
  });
});
