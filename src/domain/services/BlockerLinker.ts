import { Issue } from "../models/Issue";
import { BlockingMap, BlockingRecord } from "../models/BlockingRecord";
import { UnresolvedIssueReferenceError } from "../models/Errors";

export const RESOLVED_STATUSES = ["Done", "Resolved", "Fertig", "Closed"];
export const RELEVANT_PRIORITIES = ["High", "Highest"];
export const RELEVANT_SEVERITIES = ["Major"];
export const BLOCKS_LINK_TYPE = "Blocks";

export type UnresolvedReferencePolicy = "fail" | "skip";

export interface GetBlockedOptions {
  onUnresolvedReference?: UnresolvedReferencePolicy;
  warn?: (message: string) => void;
}

export function isResolved(issue: Issue): boolean {
  return RESOLVED_STATUSES.includes(issue.status);
}

/**
 * An issue is relevant when it is open, lies outside `component` and is
 * either High/Highest priority or Major severity.
 */
export function relevant(issue: Issue, component?: string | null): boolean {
  if (isResolved(issue)) return false;
  if (component != null && issue.components.includes(component)) return false;
  return (
    (issue.priority !== undefined &&
      RELEVANT_PRIORITIES.includes(issue.priority)) ||
    (issue.severity !== undefined &&
      RELEVANT_SEVERITIES.includes(issue.severity))
  );
}

/**
 * Collect, for every open issue of `checkIssues`, the relevant issues it
 * blocks and the relevant issues blocking it. Only issues blocking at least
 * one relevant issue appear in the result.
 *
 * Inward blockers are checked without the component filter, so an issue of
 * the same component can show up under `isBlockedBy`.
 */
export function getBlocked(
  checkIssues: Issue[],
  allIssues: Issue[],
  component?: string | null,
  options: GetBlockedOptions = {}
): BlockingMap {
  const { onUnresolvedReference = "fail", warn = console.warn } = options;

  const byKey = new Map<string, Issue>();
  for (const issue of allIssues) {
    if (!byKey.has(issue.key)) byKey.set(issue.key, issue);
  }
  const checkKeys = new Set(checkIssues.map((i) => i.key));

  const lookup = (sourceKey: string, key: string): Issue | undefined => {
    const found = byKey.get(key);
    if (found) return found;
    if (onUnresolvedReference === "fail") {
      throw new UnresolvedIssueReferenceError(sourceKey, key);
    }
    warn(`Skipping link ${sourceKey} -> ${key}: ${key} was not fetched`);
    return undefined;
  };

  const blocked: BlockingMap = new Map();
  for (const issue of checkIssues) {
    if (isResolved(issue)) continue;

    const record: BlockingRecord = { blocks: [], isBlockedBy: [] };
    for (const link of issue.links) {
      if (link.type !== BLOCKS_LINK_TYPE) continue;

      if (link.direction === "outward") {
        // same-component targets are never counted
        if (checkKeys.has(link.targetKey)) continue;
        const target = lookup(issue.key, link.targetKey);
        if (target && relevant(target, component)) {
          record.blocks.push(target.key);
        }
      } else {
        const source = lookup(issue.key, link.targetKey);
        if (source && relevant(source, null)) {
          record.isBlockedBy.push(source.key);
        }
      }
    }

    if (record.blocks.length > 0) blocked.set(issue.key, record);
  }
  return blocked;
}
