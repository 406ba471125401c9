import { describe, expect, it } from "vitest";
import { FakeSite } from "../test-utils/fake-site";
import { isPathAllowed, parseRobots, RobotsGate } from "./robots";

const ROBOTS = `# comment
User-agent: *
Disallow: /admin
Allow: /admin/public
Disallow: /*.json$

User-agent: site-audit
Disallow: /drafts

Sitemap: https://example.com/sitemap-index.xml
`;

describe("parseRobots", () => {
  it("uses the group naming our product token", () => {
    const rules = parseRobots(ROBOTS, "site-audit/1.0");
    expect(rules.disallows).toEqual(["/drafts"]);
    expect(rules.sitemaps).toEqual(["https://example.com/sitemap-index.xml"]);
  });

  it("falls back to the catch-all group", () => {
    const rules = parseRobots(ROBOTS, "other-bot/2.0");
    expect(rules.disallows).toEqual(["/admin", "/*.json$"]);
    expect(rules.allows).toEqual(["/admin/public"]);
  });
});

describe("isPathAllowed", () => {
  const rules = parseRobots(ROBOTS, "other-bot/2.0");

  it("applies the longest matching rule", () => {
    expect(isPathAllowed("/admin/users", rules)).toBe(false);
    expect(isPathAllowed("/admin/public/page", rules)).toBe(true);
    expect(isPathAllowed("/about", rules)).toBe(true);
  });

  it("supports wildcards and end anchors", () => {
    expect(isPathAllowed("/data/items.json", rules)).toBe(false);
    expect(isPathAllowed("/data/items.json?v=2", rules)).toBe(true);
  });

  it("lets Allow win a tie", () => {
    expect(isPathAllowed("/x", { allows: ["/x"], disallows: ["/x"], sitemaps: [] })).toBe(true);
  });
});

describe("RobotsGate", () => {
  it("fetches robots.txt once per origin", async () => {
    const site = new FakeSite({ "/robots.txt": { body: "User-agent: *\nDisallow: /private" } });
    const gate = new RobotsGate(site, "site-audit/1.0", 1_000);

    const answers = await Promise.all([
      gate.isAllowed("https://example.com/private/a"),
      gate.isAllowed("https://example.com/public"),
      gate.isAllowed("https://example.com/private"),
    ]);

    expect(answers).toEqual([false, true, false]);
    expect(site.requests).toEqual(["https://example.com/robots.txt"]);
  });

  it("allows everything when robots.txt is missing or unreachable", async () => {
    const missing = new RobotsGate(new FakeSite({}), "site-audit/1.0", 1_000);
    const down = new RobotsGate(new FakeSite({ "/robots.txt": { networkError: true } }), "site-audit/1.0", 1_000);

    expect(await missing.isAllowed("https://example.com/anything")).toBe(true);
    expect(await down.isAllowed("https://example.com/anything")).toBe(true);
    expect((await missing.policyFor("https://example.com/")).present).toBe(false);
  });
});
