import { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";
import { RULE_CATEGORIES, SEVERITY_BANDS } from "@codeguard/shared";
import type { SeverityBand } from "@codeguard/shared";
import type { RuleCatalog } from "@codeguard/core";
import type { Report } from "./report.js";

export interface FormatOptions {
  color?: boolean;
  /** Append each rule's review questions under its first finding. */
  guidance?: boolean;
}

function paintBand(chalk: ChalkInstance, band: SeverityBand, text: string): string {
  switch (band) {
    case "Critical":
      return chalk.magenta.bold(text);
    case "High":
      return chalk.red(text);
    case "Medium":
      return chalk.yellow(text);
    case "Low":
      return chalk.blue(text);
  }
}

/** Plain-text rendering of a report for terminals and logs. */
export function formatReport(
  report: Report,
  catalog: RuleCatalog,
  options: FormatOptions = {},
): string {
  const chalk = new Chalk({ level: options.color ? 1 : 0 });
  const withGuidance = options.guidance ?? true;
  const lines: string[] = [];
  const bands = report.countBySeverityBand();
  const categories = report.countByCategory();

  lines.push(chalk.bold(`Security scan: ${catalog.name} ${report.catalogVersion}`));
  lines.push(
    `Findings: ${report.total}  ` +
      SEVERITY_BANDS.map((band) => paintBand(chalk, band, `${band} ${bands[band]}`)).join("  "),
  );
  if (report.incomplete) {
    lines.push(chalk.yellow("Scan incomplete: not all units were processed"));
  }

  if (report.total === 0) {
    lines.push(chalk.green("No findings."));
  } else {
    lines.push("");
    const annotated = new Set<string>();
    for (const f of report.findings()) {
      const score = String(f.score).padStart(2, " ");
      const tags = [f.lowConfidence ? "low-confidence" : "", f.anomaly ? "anomaly" : ""]
        .filter((t) => t.length > 0)
        .map((t) => ` [${t}]`)
        .join("");
      lines.push(
        `${paintBand(chalk, f.band, `${score} ${f.band}`)}  ${f.category}  ${f.unit}:${f.line}${tags}`,
      );
      lines.push(`    ${chalk.dim(f.excerpt)}`);
      lines.push(`    ${f.rationale}`);

      if (withGuidance && !annotated.has(f.ruleId)) {
        annotated.add(f.ruleId);
        const rule = catalog.ruleById(f.ruleId);
        for (const question of rule?.guidance ?? []) {
          lines.push(`    ${chalk.cyan("?")} ${question}`);
        }
      }
    }
  }

  lines.push("");
  lines.push("By category:");
  for (const category of RULE_CATEGORIES) {
    lines.push(`  ${category}: ${categories[category]}`);
  }

  if (report.diagnostics.length > 0) {
    lines.push("");
    lines.push("Diagnostics:");
    for (const d of report.diagnostics) {
      const where = d.unit ? ` ${d.unit}${d.line !== undefined ? `:${d.line}` : ""}` : "";
      lines.push(`  ${d.kind}${where}: ${d.message}`);
    }
  }

  return lines.join("\n");
}
