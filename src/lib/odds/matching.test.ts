/**
 * Unit tests for sportsbook name matching
 */

import { describe, it, expect } from "vitest";
import { normalizePlayerName, playerMatches, teamMatches } from "./matching";

describe("teamMatches", () => {
  it("matches identical names case-insensitively", () => {
    expect(teamMatches("Kansas City Chiefs", "kansas city chiefs")).toBe(true);
  });

  it("matches a known abbreviation through the alias table", () => {
    expect(teamMatches("Kansas City Chiefs", "KC")).toBe(true);
    expect(teamMatches("Green Bay Packers", "GB")).toBe(true);
    expect(teamMatches("Washington Commanders", "WSH")).toBe(true);
  });

  it("matches an alias on the sportsbook side too", () => {
    expect(teamMatches("SF", "San Francisco 49ers")).toBe(true);
  });

  it("matches a short abbreviation contained in the other side's name", () => {
    expect(teamMatches("DAL", "Dallas Cowboys")).toBe(true);
    expect(teamMatches("Dallas Cowboys", "dal")).toBe(true);
  });

  it("applies substring containment to any string of four characters or fewer", () => {
    // "chi" appears inside "chiefs"
    expect(teamMatches("Kansas City Chiefs", "CHI")).toBe(true);
  });

  it("does not match a nickname longer than four characters", () => {
    expect(teamMatches("Philadelphia Eagles", "Eagles")).toBe(false);
  });

  it("returns false for empty input", () => {
    expect(teamMatches("", "KC")).toBe(false);
    expect(teamMatches("Kansas City Chiefs", "")).toBe(false);
  });
});

describe("normalizePlayerName", () => {
  it("lower-cases and strips suffixes", () => {
    expect(normalizePlayerName("Kenneth Walker III")).toEqual(["kenneth", "walker"]);
    expect(normalizePlayerName("Aaron Jones Sr.")).toEqual(["aaron", "jones"]);
    expect(normalizePlayerName("  Odell   Beckham Jr. ")).toEqual(["odell", "beckham"]);
  });
});

describe("playerMatches", () => {
  it("ignores suffixes on either side", () => {
    expect(playerMatches("Aaron Jones", "Aaron Jones Sr.")).toBe(true);
    expect(playerMatches("Marvin Harrison Jr.", "Marvin Harrison")).toBe(true);
  });

  it("decides on the last name", () => {
    expect(playerMatches("Josh Allen", "Josh Jacobs")).toBe(false);
    expect(playerMatches("Travis Kelce", "Jason Kelce")).toBe(true);
  });

  it("requires at least two name tokens on both sides", () => {
    expect(playerMatches("Jones", "Aaron Jones")).toBe(false);
    expect(playerMatches("Aaron Jones", "Jones")).toBe(false);
  });

  it("returns false for empty descriptions", () => {
    expect(playerMatches("", "Aaron Jones")).toBe(false);
  });
});
