/**
 * Grandfather-father-son retention policy logic
 */

import type {
  CatalogEntry,
  DeleteDecision,
  KeepDecision,
  RetentionPolicy,
  RotationDecision,
  RotationPlan,
} from "../../types";
import { bucketKeys } from "../../utils/naming";
import { compareEntries } from "../catalog";

/**
 * A bounded set of period keys. Each period admits only its first (most
 * recent) archive, and only while fewer than `limit` periods are claimed.
 */
class BucketSet {
  private readonly seen = new Set<string>();

  constructor(private readonly limit: number) {}

  claim(key: string): boolean {
    if (this.seen.has(key) || this.seen.size >= this.limit) {
      return false;
    }
    this.seen.add(key);
    return true;
  }
}

export interface PlanOptions {
  /** Names kept whatever the policy says; they claim no bucket */
  retain?: readonly string[];
}

/**
 * Classify archives into kept and deleted.
 *
 * Archives are walked newest first. Each one is kept by the first rule that
 * admits it, in order daily, weekly, monthly. Names without a parseable
 * timestamp are always kept. Archives without a digest record claim no bucket
 * and are deleted unless `policy.keepUnsealed` is set.
 */
export function planRotation(
  entries: CatalogEntry[],
  policy: RetentionPolicy,
  options: PlanOptions = {},
): RotationPlan {
  const retain = new Set(options.retain);
  const days = new BucketSet(policy.dailyKeep);
  const weeks = new BucketSet(policy.weeklyKeep);
  const months = new BucketSet(policy.monthlyKeep);

  const decisions: RotationDecision[] = [...entries].sort(compareEntries).map((entry): RotationDecision => {
    if (retain.has(entry.name)) {
      return { entry, action: "keep", reason: "retained", bucket: null };
    }

    if (!entry.parsed) {
      return { entry, action: "keep", reason: "unparseable", bucket: null };
    }

    if (!entry.sealed && !policy.keepUnsealed) {
      return { entry, action: "delete", reason: "unsealed" };
    }

    const keys = bucketKeys(entry.parsed);
    if (days.claim(keys.day)) {
      return { entry, action: "keep", reason: "daily", bucket: keys.day };
    }
    if (weeks.claim(keys.week)) {
      return { entry, action: "keep", reason: "weekly", bucket: keys.week };
    }
    if (months.claim(keys.month)) {
      return { entry, action: "keep", reason: "monthly", bucket: keys.month };
    }

    return { entry, action: "delete", reason: "expired" };
  });

  const kept = decisions.filter((d): d is KeepDecision => d.action === "keep");
  const deleted = decisions.filter((d): d is DeleteDecision => d.action === "delete");

  return { decisions, kept, deleted };
}
