import { logger } from '../shared/logger.js';

interface RobotsRule {
  allow: boolean;
  pattern: string;
}

interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
}

export interface RobotsPolicy {
  isAllowed(url: string): boolean;
}

export const ALLOW_ALL: RobotsPolicy = { isAllowed: () => true };

/**
 * Split robots.txt into user-agent groups. Consecutive `User-agent` lines
 * share one group; any rule line closes the agent list.
 */
function parseGroups(text: string): RobotsGroup[] {
  const groups: RobotsGroup[] = [];
  let current: RobotsGroup | null = null;
  let collectingAgents = false;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    const colon = line.indexOf(':');
    if (colon <= 0) continue;

    const field = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();

    if (field === 'user-agent') {
      if (!current || !collectingAgents) {
        current = { agents: [], rules: [] };
        groups.push(current);
      }
      current.agents.push(value.toLowerCase());
      collectingAgents = true;
      continue;
    }

    if (field === 'allow' || field === 'disallow') {
      collectingAgents = false;
      if (!current) continue;
      // An empty Disallow means "allow everything" and adds no rule.
      if (value === '') continue;
      current.rules.push({ allow: field === 'allow', pattern: value });
    }
  }

  return groups;
}

function patternToRegExp(pattern: string): RegExp {
  const anchored = pattern.endsWith('$');
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const escaped = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${escaped}${anchored ? '$' : ''}`);
}

/**
 * Build a policy for one agent token. The most specific matching group wins
 * (an agent name that the token contains), else the `*` group. Within the
 * group the longest matching pattern decides; Allow wins ties.
 */
export function parseRobotsTxt(text: string, agentToken: string): RobotsPolicy {
  const groups = parseGroups(text);
  const token = agentToken.toLowerCase();

  const specific = groups.filter((g) => g.agents.some((a) => a !== '*' && token.includes(a)));
  const chosen = specific.length > 0 ? specific : groups.filter((g) => g.agents.includes('*'));
  const rules = chosen.flatMap((g) => g.rules).map((r) => ({ ...r, re: patternToRegExp(r.pattern) }));

  if (rules.length === 0) return ALLOW_ALL;

  return {
    isAllowed(url: string): boolean {
      let target: string;
      try {
        const parsed = new URL(url);
        target = `${parsed.pathname}${parsed.search}`;
      } catch {
        return true;
      }

      let best: { allow: boolean; length: number } | null = null;
      for (const rule of rules) {
        if (!rule.re.test(target)) continue;
        const length = rule.pattern.length;
        if (!best || length > best.length || (length === best.length && rule.allow)) {
          best = { allow: rule.allow, length };
        }
      }
      return best ? best.allow : true;
    },
  };
}

export interface RobotsCacheOptions {
  userAgent: string;
  agentToken: string;
  timeoutMs: number;
}

/**
 * Per-run robots.txt lookups, one request per origin. Concurrent callers for
 * the same origin share the pending request.
 */
export class RobotsCache {
  private readonly policies = new Map<string, Promise<RobotsPolicy>>();

  constructor(private readonly options: RobotsCacheOptions) {}

  async isAllowed(url: string, signal?: AbortSignal): Promise<boolean> {
    let origin: string;
    try {
      origin = new URL(url).origin;
    } catch {
      return true;
    }

    let pending = this.policies.get(origin);
    if (!pending) {
      pending = this.load(origin, signal);
      this.policies.set(origin, pending);
    }
    const policy = await pending;
    return policy.isAllowed(url);
  }

  private async load(origin: string, signal?: AbortSignal): Promise<RobotsPolicy> {
    const robotsUrl = `${origin}/robots.txt`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(robotsUrl, {
        headers: { 'User-Agent': this.options.userAgent, Accept: 'text/plain, */*' },
        signal: controller.signal,
        redirect: 'follow',
      });
      if (!response.ok) {
        logger.debug({ url: robotsUrl, status: response.status }, 'robots.txt unavailable, allowing all');
        return ALLOW_ALL;
      }
      return parseRobotsTxt(await response.text(), this.options.agentToken);
    } catch (err) {
      logger.debug(
        { url: robotsUrl, error: err instanceof Error ? err.message : String(err) },
        'robots.txt fetch failed, allowing all',
      );
      return ALLOW_ALL;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
