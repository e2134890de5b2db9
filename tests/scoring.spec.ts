import { describe, expect, it } from "vitest";
import {
  compareRanked,
  descriptionScore,
  naturalLanguageScore,
  pathScore,
  tierScore,
  tokenBonus,
  type ScoringFields
} from "@/lib/scoring";

const revokeRecord: ScoringFields = {
  searchContent: "/api/{id}/auth/token/revoke Revoke Access Token Invalidates a token. auth_revocation_api POST",
  summary: "Revoke Access Token",
  path: "/api/{id}/auth/token/revoke",
  description: "Invalidates a token."
};

const tagOnlyRecord: ScoringFields = {
  searchContent: "/api/{id}/client/list List Clients Client Management revoke-after token-type",
  summary: "List Clients",
  path: "/api/{id}/client/list",
  description: ""
};

describe("tierScore", () => {
  it("takes the first field containing the whole phrase", () => {
    expect(tierScore(revokeRecord, "access token")).toBe(150);
    expect(tierScore({ ...revokeRecord, searchContent: "" }, "access token")).toBe(120);
    expect(tierScore({ ...revokeRecord, searchContent: "", summary: "" }, "auth/token")).toBe(100);
    expect(tierScore({ searchContent: "", summary: "", path: "", description: "a token." }, "token")).toBe(80);
  });

  it("falls back to 10 when no field holds the phrase", () => {
    expect(tierScore(revokeRecord, "revoke token")).toBe(10);
  });
});

describe("tokenBonus", () => {
  it("awards the highest-priority field only", () => {
    expect(tokenBonus(revokeRecord, "revoke")).toBe(15);
    expect(tokenBonus({ ...revokeRecord, summary: "" }, "revoke")).toBe(12);
    expect(tokenBonus({ ...revokeRecord, summary: "", path: "" }, "invalidates")).toBe(8);
    expect(tokenBonus(revokeRecord, "post")).toBe(5);
    expect(tokenBonus(revokeRecord, "missing")).toBe(0);
  });
});

describe("naturalLanguageScore", () => {
  it("adds one bonus per token to the tier", () => {
    expect(naturalLanguageScore(revokeRecord, "revoke token", ["revoke", "token"])).toBe(40);
  });

  it("ranks a summary match above a searchContent-only match", () => {
    const summaryMatch = naturalLanguageScore(revokeRecord, "revoke token", ["revoke", "token"]);
    const contentOnly = naturalLanguageScore(tagOnlyRecord, "revoke token", ["revoke", "token"]);
    expect(contentOnly).toBe(20);
    expect(summaryMatch).toBeGreaterThan(contentOnly);
  });

  it("gives the top tier to a phrase found in searchContent", () => {
    expect(
      naturalLanguageScore({ ...tagOnlyRecord, searchContent: "Revoke Token" }, "revoke token", ["revoke", "token"])
    ).toBe(160);
  });

  it("counts repeated tokens every time", () => {
    expect(naturalLanguageScore(revokeRecord, "token token", ["token", "token"])).toBe(40);
  });

  it("is case-insensitive", () => {
    const upper = naturalLanguageScore(revokeRecord, "ACCESS", ["ACCESS"]);
    const lower = naturalLanguageScore(revokeRecord, "access", ["access"]);
    expect(upper).toBe(lower);
    expect(lower).toBe(165);
  });
});

describe("pathScore", () => {
  it("scores exact, substring and floor matches", () => {
    expect(pathScore("/api/{id}/auth/token", "/api/{id}/auth/token")).toBe(100);
    expect(pathScore("/api/{id}/auth/token", "/AUTH/token")).toBe(80);
    expect(pathScore("/api/{id}/auth/token", "/client")).toBe(50);
  });

  it("requires the same case for an exact match", () => {
    expect(pathScore("/api/Info", "/api/info")).toBe(80);
  });
});

describe("descriptionScore", () => {
  it("prefers the summary over the description", () => {
    expect(descriptionScore({ summary: "Revoke Access Token", description: "revokes" }, "access token")).toBe(100);
    expect(descriptionScore({ summary: "Revoke", description: "Invalidates an access token" }, "access token")).toBe(90);
    expect(descriptionScore({ summary: "", description: "" }, "access token")).toBe(30);
  });
});

describe("compareRanked", () => {
  it("orders by score, then path, then method", () => {
    const ranked = [
      { path: "/b", method: "GET", score: 10 },
      { path: "/a", method: "POST", score: 10 },
      { path: "/a", method: "GET", score: 10 },
      { path: "/z", method: "GET", score: 40 }
    ].sort(compareRanked);

    expect(ranked.map((entry) => `${entry.score} ${entry.method} ${entry.path}`)).toEqual([
      "40 GET /z",
      "10 GET /a",
      "10 POST /a",
      "10 GET /b"
    ]);
  });

  it("compares paths by code unit rather than locale", () => {
    const ranked = [
      { path: "/a", method: "GET", score: 1 },
      { path: "/B", method: "GET", score: 1 }
    ].sort(compareRanked);
    expect(ranked.map((entry) => entry.path)).toEqual(["/B", "/a"]);
  });
});
