import type {
  EntityTable,
  EntityType,
  IntegrityPolicy,
  IntegritySummary,
  IntegrityViolation,
  LinkTables,
  NormalizedTables
} from "../types/domain.js";

export interface IntegrityDecision {
  open: boolean;
  reasons: string[];
  summary: IntegritySummary;
}

function identifiersOf(table: EntityTable | undefined): Set<string> | null {
  if (!table) {
    return null;
  }
  const ids = new Set<string>();
  for (const record of table.records) {
    const value = record[table.identifierField];
    if (typeof value === "string") {
      ids.add(value);
    }
  }
  return ids;
}

/** Reports every link endpoint that does not resolve; links themselves are left untouched. */
export function validate(tables: NormalizedTables, links: LinkTables): IntegrityViolation[] {
  const controls = identifiersOf(tables.get("control")) ?? new Set<string>();
  const targetIds = new Map<EntityType, Set<string> | null>();
  const violations: IntegrityViolation[] = [];

  for (const table of links.values()) {
    if (!targetIds.has(table.targetEntityType)) {
      targetIds.set(table.targetEntityType, identifiersOf(tables.get(table.targetEntityType)));
    }
    const targets = targetIds.get(table.targetEntityType) ?? null;

    for (const link of table.links) {
      if (!controls.has(link.sourceId)) {
        violations.push({
          relationshipType: table.relationshipType,
          sourceId: link.sourceId,
          targetId: link.targetId,
          targetEntityType: table.targetEntityType,
          severity: "error",
          reason: "unknown_control"
        });
      }
      if (targets === null || !targets.has(link.targetId)) {
        violations.push({
          relationshipType: table.relationshipType,
          sourceId: link.sourceId,
          targetId: link.targetId,
          targetEntityType: table.targetEntityType,
          severity: "warning",
          reason: targets === null ? "missing_target_table" : "unknown_target"
        });
      }
    }
  }

  return violations;
}

export function summarizeViolations(violations: readonly IntegrityViolation[]): IntegritySummary {
  const summary: IntegritySummary = { errors: 0, warnings: 0, byRelationshipType: {} };
  for (const violation of violations) {
    const bucket = summary.byRelationshipType[violation.relationshipType] ?? { errors: 0, warnings: 0 };
    if (violation.severity === "error") {
      summary.errors += 1;
      bucket.errors += 1;
    } else {
      summary.warnings += 1;
      bucket.warnings += 1;
    }
    summary.byRelationshipType[violation.relationshipType] = bucket;
  }
  return summary;
}

export function evaluateIntegrity(
  violations: readonly IntegrityViolation[],
  policy: IntegrityPolicy = { failOnError: true }
): IntegrityDecision {
  const summary = summarizeViolations(violations);
  const reasons: string[] = [];
  if (policy.failOnError && summary.errors > 0) {
    reasons.push(`${summary.errors} link(s) reference unknown controls`);
  }
  if (policy.maxWarnings !== undefined && summary.warnings > policy.maxWarnings) {
    reasons.push(`${summary.warnings} warning(s) exceed the limit of ${policy.maxWarnings}`);
  }
  return { open: reasons.length === 0, reasons, summary };
}
