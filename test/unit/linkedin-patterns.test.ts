import { describe, it, expect } from "vitest";
import {
  extractCompany,
  extractLinkedInUrl,
  findProfileUrl,
  searchUrl,
} from "../../src/linkedin/patterns.js";

describe("extractLinkedInUrl", () => {
  it("finds a bare domain URL in the bio", () => {
    expect(extractLinkedInUrl({ bio: "Builder. LinkedIn: linkedin.com/in/bob" })).toBe(
      "https://www.linkedin.com/in/bob",
    );
  });

  it("normalizes case, trailing slash and query", () => {
    expect(extractLinkedInUrl({ website: "https://www.linkedin.com/in/Jane-Doe/?utm_source=x" })).toBe(
      "https://www.linkedin.com/in/jane-doe",
    );
  });

  it("checks the website before the bio", () => {
    expect(
      extractLinkedInUrl({
        website: "https://linkedin.com/in/site-one",
        bio: "also at linkedin.com/in/bio-two",
      }),
    ).toBe("https://www.linkedin.com/in/site-one");
  });

  it("accepts country subdomains", () => {
    expect(extractLinkedInUrl({ bio: "see uk.linkedin.com/in/someone" })).toBe(
      "https://www.linkedin.com/in/someone",
    );
  });

  it.each([
    ["@linkedin: janedoe", "https://www.linkedin.com/in/janedoe"],
    ["Writer | LinkedIn: JaneDoe99", "https://www.linkedin.com/in/janedoe99"],
    ["Say hi on LinkedIn: jane-doe.", "https://www.linkedin.com/in/jane-doe"],
    ["(LinkedIn: jdoe), blog below", "https://www.linkedin.com/in/jdoe"],
  ])("understands the shorthand %j", (bio, expected) => {
    expect(extractLinkedInUrl({ bio })).toBe(expected);
  });

  it.each([
    "LinkedIn: linkedin.com/company/acme",
    "LinkedIn: https://lnkd.in/abc123",
    "LinkedIn: www.linkedin.com/pub/jane",
  ])("does not read a handle out of the non-profile link %j", (bio) => {
    expect(extractLinkedInUrl({ bio })).toBeUndefined();
  });

  it("returns undefined when nothing is stated", () => {
    expect(extractLinkedInUrl({ bio: "I post about linkedin growth", website: "https://example.com" })).toBeUndefined();
    expect(extractLinkedInUrl({})).toBeUndefined();
  });
});

describe("findProfileUrl", () => {
  it("pulls a URL out of surrounding text", () => {
    expect(findProfileUrl("Here it is: https://www.linkedin.com/in/jane-doe-123")).toBe(
      "https://www.linkedin.com/in/jane-doe-123",
    );
  });

  it("completes a partial path", () => {
    expect(findProfileUrl("in/jane-doe")).toBe("https://www.linkedin.com/in/jane-doe");
  });

  it("returns undefined for a refusal", () => {
    expect(findProfileUrl("NOT_FOUND")).toBeUndefined();
  });
});

describe("extractCompany", () => {
  it.each([
    ["CTO at Acme Inc. Building things", "Acme"],
    ["Co-founder of Blue Bottle Labs, coffee nerd", "Blue Bottle Labs"],
    ["Working at Globex", "Globex"],
    ["Engineer @Initech", "Initech"],
  ])("extracts the company from %j", (bio, expected) => {
    expect(extractCompany(bio)).toBe(expected);
  });

  it("rejects names that are too short or absent", () => {
    expect(extractCompany("at AB")).toBeUndefined();
    expect(extractCompany("just vibes")).toBeUndefined();
    expect(extractCompany(undefined)).toBeUndefined();
  });
});

describe("searchUrl", () => {
  it("builds a people search from name and location", () => {
    expect(searchUrl("Jane Doe", "Berlin, DE")).toBe(
      "https://www.linkedin.com/search/results/people/?keywords=Jane+Doe%20Berlin+DE",
    );
  });

  it("drops punctuation and encodes non-ASCII letters", () => {
    expect(searchUrl("Dr. José Ruiz")).toBe(
      "https://www.linkedin.com/search/results/people/?keywords=Dr+Jos%C3%A9+Ruiz",
    );
  });
});
