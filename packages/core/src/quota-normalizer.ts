import type { CreditBlock, ModelQuota, QuotaPool, QuotaReport } from '@quotascope/protocol';
import {
  modelConfigSchema,
  userStatusResponseSchema,
  type RawModelConfig,
  type RawQuotaInfo,
} from './quota-schema.js';

/** Known model families, in match priority. */
const MODEL_FAMILIES: ReadonlyArray<readonly [needle: string, family: string]> = [
  ['claude', 'Claude'],
  ['gemini', 'Gemini'],
  ['gpt', 'GPT'],
];

const MAX_NAMED_FAMILIES = 3;
const FALLBACK_POOL_NAME = 'Premium Models';

// Date-time with an explicit zone; anything else has no defined instant
const ISO_INSTANT = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

/**
 * One decimal place, ties to even on the exact binary value.
 * toFixed rounds the exact value but breaks ties upward; a tie at one
 * decimal only happens when `4 * value` is an odd integer.
 */
export function roundTo1(value: number): number {
  const tie = Number.isInteger(value * 4) && !Number.isInteger(value * 2);
  if (!tie) return Number(value.toFixed(1));
  const floor = Math.floor(value * 10);
  return (floor % 2 === 0 ? floor : floor + 1) / 10;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

// Date.parse rolls 2026-02-30 over into March
function isRealDateTime(match: RegExpExecArray): boolean {
  const [year, month, day, hour, minute, second] = match.slice(1, 7).map((part) => Number(part ?? 0));
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return false;
  const days = month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
  return day >= 1 && day <= days;
}

export function buildCreditBlock(monthly: number | undefined, available: number | undefined): CreditBlock | null {
  if (!monthly || available === undefined) return null;
  const used = monthly - available;
  return {
    monthly,
    available,
    used,
    usedPercentage: roundTo1((used / monthly) * 100),
    remainingPercentage: roundTo1((available / monthly) * 100),
  };
}

/** Signed ms from `now` to `resetTime`, truncated; 0 when the text is not a zoned ISO-8601 instant. */
export function millisUntil(resetTime: string, now: Date): number {
  const match = ISO_INSTANT.exec(resetTime);
  if (!match || !isRealDateTime(match)) return 0;
  const at = Date.parse(resetTime);
  if (Number.isNaN(at)) return 0;
  return Math.trunc(at - now.getTime());
}

/** Decided on the raw entry, before malformed fields degrade to absent. */
function hasQuotaInfo(entry: unknown): boolean {
  if (typeof entry !== 'object' || entry === null || !('quotaInfo' in entry)) return false;
  const { quotaInfo } = entry;
  return typeof quotaInfo === 'object' && quotaInfo !== null && !Array.isArray(quotaInfo)
    && Object.keys(quotaInfo).length > 0;
}

function toModelQuota(config: RawModelConfig, quota: RawQuotaInfo, now: Date): ModelQuota {
  const fraction = quota.remainingFraction ?? null;
  const resetTime = quota.resetTime ?? '';
  return {
    label: config.label ?? 'Unknown',
    modelId: config.modelOrAlias?.model ?? 'unknown',
    remainingFraction: fraction,
    remainingPercentage: fraction === null ? null : roundTo1(fraction * 100),
    usedPercentage: fraction === null ? null : roundTo1((1 - fraction) * 100),
    isExhausted: fraction === 0,
    resetTime,
    timeUntilResetMs: millisUntil(resetTime, now),
  };
}

interface Pressure {
  isExhausted: boolean;
  usedPercentage: number | null;
}

/** Exhausted first, then most used. A missing percentage orders as 0. Stable. */
export function comparePressure(a: Pressure, b: Pressure): number {
  if (a.isExhausted !== b.isExhausted) {
    return a.isExhausted ? -1 : 1;
  }
  return (b.usedPercentage ?? 0) - (a.usedPercentage ?? 0);
}

function familyOf(label: string): string {
  const lower = label.toLowerCase();
  const known = MODEL_FAMILIES.find(([needle]) => lower.includes(needle));
  if (known) return known[1];
  return label.trim().split(/\s+/)[0] ?? label;
}

export function derivePoolName(labels: readonly string[]): string {
  if (labels.length === 1) return labels[0];

  const families = [...new Set(labels.map(familyOf))].sort();
  if (families.length === 1) return `${families[0]} Models`;
  if (families.length <= MAX_NAMED_FAMILIES) return `${families.join(' / ')} Models`;
  return FALLBACK_POOL_NAME;
}

/** Models sharing the exact (resetTime, remainingFraction) pair form one pool. */
export function groupIntoPools(models: readonly ModelQuota[]): QuotaPool[] {
  const groups = new Map<string, ModelQuota[]>();
  for (const model of models) {
    const key = JSON.stringify([model.resetTime, model.remainingFraction]);
    const members = groups.get(key);
    if (members) {
      members.push(model);
    } else {
      groups.set(key, [model]);
    }
  }

  const pools: QuotaPool[] = [];
  for (const members of groups.values()) {
    const first = members[0];
    pools.push({
      name: derivePoolName(members.map((m) => m.label)),
      models: members,
      modelCount: members.length,
      remainingFraction: first.remainingFraction,
      remainingPercentage: first.remainingPercentage,
      usedPercentage: first.usedPercentage,
      isExhausted: first.isExhausted,
      resetTime: first.resetTime,
      timeUntilResetMs: first.timeUntilResetMs,
    });
  }
  return pools.sort(comparePressure);
}

/**
 * Reshape a raw GetUserStatus response into a QuotaReport.
 * Pure: identical input and `now` give identical output.
 */
export function normalizeQuota(raw: unknown, now: Date): QuotaReport {
  const parsed = userStatusResponseSchema.safeParse(raw);
  const userStatus = parsed.success ? parsed.data.userStatus : undefined;
  const planStatus = userStatus?.planStatus;
  const planInfo = planStatus?.planInfo;

  const models: ModelQuota[] = [];
  for (const entry of userStatus?.cascadeModelConfigData?.clientModelConfigs ?? []) {
    if (!hasQuotaInfo(entry)) continue;
    const config = modelConfigSchema.safeParse(entry);
    if (!config.success) continue;
    models.push(toModelQuota(config.data, config.data.quotaInfo ?? {}, now));
  }
  models.sort(comparePressure);

  return {
    timestamp: now.toISOString(),
    planName: planInfo?.planName ?? 'Unknown',
    planTier: planInfo?.teamsTier ?? '',
    promptCredits: buildCreditBlock(planInfo?.monthlyPromptCredits, planStatus?.availablePromptCredits),
    flowCredits: buildCreditBlock(planInfo?.monthlyFlowCredits, planStatus?.availableFlowCredits),
    models,
    pools: groupIntoPools(models),
    userName: userStatus?.name ?? '',
    userEmail: userStatus?.email ?? '',
  };
}
