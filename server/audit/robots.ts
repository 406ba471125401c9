import { fetchWithDeadline, isFetchFailure } from "./fetcher";
import type { FetchPort } from "./types";
import { getOrigin, getPath, getRobotsUrl } from "./url-utils";

export interface RobotsRules {
  allows: string[];
  disallows: string[];
  sitemaps: string[];
}

export interface RobotsPolicy {
  present: boolean;
  rules: RobotsRules;
}

const ALLOW_ALL: RobotsPolicy = {
  present: false,
  rules: { allows: [], disallows: [], sitemaps: [] },
};

type Group = { agents: string[]; allows: string[]; disallows: string[] };

export function parseRobots(robotsText: string, userAgent: string): RobotsRules {
  const groups: Group[] = [];
  const sitemaps: string[] = [];
  let current: Group = { agents: [], allows: [], disallows: [] };
  let hasRulesInGroup = false;

  for (const rawLine of robotsText.split(/\r?\n/)) {
    const line = rawLine.split("#")[0]?.trim() ?? "";
    if (!line) continue;

    const separator = line.indexOf(":");
    if (separator === -1) continue;
    const field = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    if (field === "user-agent") {
      if (hasRulesInGroup && current.agents.length > 0) {
        groups.push(current);
        current = { agents: [], allows: [], disallows: [] };
        hasRulesInGroup = false;
      }
      if (value) current.agents.push(value.toLowerCase());
    } else if (field === "allow") {
      current.allows.push(value);
      hasRulesInGroup = true;
    } else if (field === "disallow") {
      current.disallows.push(value);
      hasRulesInGroup = true;
    } else if (field === "sitemap" && value) {
      sitemaps.push(value);
    }
  }

  if (current.agents.length > 0) groups.push(current);

  // A group naming our product token wins over the catch-all group.
  const token = userAgent.split("/")[0]?.trim().toLowerCase() ?? "";
  const specific = groups.filter((group) => group.agents.some((agent) => agent !== "*" && token.startsWith(agent)));
  const matching = specific.length > 0 ? specific : groups.filter((group) => group.agents.includes("*"));

  return {
    allows: matching.flatMap((group) => group.allows).filter(Boolean),
    disallows: matching.flatMap((group) => group.disallows).filter(Boolean),
    sitemaps,
  };
}

function ruleToRegExp(rule: string): RegExp {
  const anchored = rule.endsWith("$");
  const body = (anchored ? rule.slice(0, -1) : rule)
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${body}${anchored ? "$" : ""}`);
}

/** Longest matching rule wins; on a tie, Allow wins. No match means allowed. */
export function isPathAllowed(candidatePath: string, rules: RobotsRules): boolean {
  const candidates = [
    ...rules.disallows.map((rule) => ({ rule, allow: false })),
    ...rules.allows.map((rule) => ({ rule, allow: true })),
  ];

  let best: { len: number; allow: boolean } | undefined;
  for (const { rule, allow } of candidates) {
    if (!ruleToRegExp(rule).test(candidatePath)) continue;
    if (!best || rule.length > best.len || (rule.length === best.len && allow)) {
      best = { len: rule.length, allow };
    }
  }

  return best ? best.allow : true;
}

/**
 * Answers allow/deny for candidate URLs of one crawl. The robots file of each
 * origin is fetched at most once; an unreachable or missing file allows all.
 */
export class RobotsGate {
  private readonly policies = new Map<string, Promise<RobotsPolicy>>();

  constructor(
    private readonly fetcher: FetchPort,
    private readonly userAgent: string,
    private readonly timeoutMs: number
  ) {}

  async isAllowed(url: string): Promise<boolean> {
    const policy = await this.policyFor(url);
    return isPathAllowed(getPath(url), policy.rules);
  }

  policyFor(url: string): Promise<RobotsPolicy> {
    const origin = getOrigin(url);
    if (!origin) return Promise.resolve(ALLOW_ALL);

    let pending = this.policies.get(origin);
    if (!pending) {
      pending = this.load(origin);
      this.policies.set(origin, pending);
    }
    return pending;
  }

  private async load(origin: string): Promise<RobotsPolicy> {
    const robotsUrl = getRobotsUrl(origin);
    if (!robotsUrl) return ALLOW_ALL;
    const result = await fetchWithDeadline(this.fetcher, robotsUrl, this.timeoutMs);
    if (isFetchFailure(result)) return ALLOW_ALL;
    return { present: true, rules: parseRobots(result.body, this.userAgent) };
  }
}
