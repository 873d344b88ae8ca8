import { createHash } from "node:crypto";

import { choiceLabels } from "./choices";
import { resolveScriptOptions, type ScriptOptionsInput } from "./config";
import { orderedQuestions } from "./csv";
import { assertWritable, writeText, type Sink } from "./io";
import { columnImportType, factorLevels, questionColumns } from "./question";
import type { Choice, ImportType, Survey } from "./types";

const FIXED_COLUMN_TYPES: ReadonlyArray<[string, ImportType]> = [
  ["id", "character"],
  ["finished", "logical"],
  ["progress", "integer"],
  ["duration", "integer"],
];

const SYNTACTIC_NAME = /^(?:[A-Za-z]|\.(?![0-9]))[A-Za-z0-9._]*$/;

export type Scale = {
  name: string;
  levels: Choice[];
};

export type ColumnClause = {
  column: string;
  type: ImportType;
  scale?: string;
  ordered?: boolean;
};

export type ScriptPlan = {
  clauses: ColumnClause[];
  // Sorted by name.
  scales: Scale[];
};

/**
 * Scale names depend only on the ordered labels, so identical level sets
 * collapse no matter which question declares them first. The labels are
 * hashed as a JSON array, keeping ["AB", "C"] and ["A", "BC"] apart.
 */
export function scaleName(levels: readonly Choice[]): string {
  const hash = createHash("sha1");
  hash.update(JSON.stringify(choiceLabels(levels)), "utf8");
  return `scale_${hash.digest("hex")}`;
}

export function rString(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

function rName(column: string): string {
  return SYNTACTIC_NAME.test(column) ? column : `\`${column.replace(/\\/g, "\\\\").replace(/`/g, "\\`")}\``;
}

/**
 * Column clauses in CSV header order, plus the scales they reference.
 */
export function planScript(survey: Survey): ScriptPlan {
  const scales = new Map<string, Scale>();
  const clauses: ColumnClause[] = FIXED_COLUMN_TYPES.map(([column, type]) => ({ column, type }));

  for (const question of orderedQuestions(survey)) {
    for (const column of questionColumns(question)) {
      const type = columnImportType(question, column);
      if (type !== "factor") {
        clauses.push({ column: column.name, type });
        continue;
      }

      const { levels, ordered } = factorLevels(question, column);
      if (levels.length === 0) {
        clauses.push({ column: column.name, type });
        continue;
      }
      const name = scaleName(levels);
      if (!scales.has(name)) scales.set(name, { name, levels });
      clauses.push({ column: column.name, type, scale: name, ordered });
    }
  }

  const sorted = [...scales.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return { clauses, scales: sorted };
}

function renderClause(clause: ColumnClause): string {
  let type: string;
  if (clause.type === "factor" && clause.scale) {
    type = `col_factor(levels = ${clause.scale}${clause.ordered ? ", ordered = TRUE" : ""})`;
  } else {
    type = `col_${clause.type}()`;
  }
  return `\t${rName(clause.column)} = ${type}`;
}

function renderScale(scale: Scale): string {
  return `${scale.name} <- c(${scale.levels.map((level) => rString(level.varName)).join(", ")})\n`;
}

/**
 * R (readr) script that imports the CSV written by renderCsv with matching
 * column types.
 */
export function renderScript(survey: Survey, csvPath: string, options: ScriptOptionsInput = {}): string {
  const { toolName, toolVersion, library } = resolveScriptOptions(options);
  const plan = planScript(survey);

  const preamble = `# Generated by ${toolName} ${toolVersion}\nlibrary(${library})\n`;
  const defs = `input_path <- ${rString(csvPath)}\n` + plan.scales.map(renderScale).join("");
  const load =
    `message(sprintf("Reading %s...", input_path))\n` +
    `data <- read_csv(input_path, col_types = cols(\n` +
    plan.clauses.map(renderClause).join(",\n") +
    `\n))\n`;
  const cleanup = "rm(input_path)\n" + plan.scales.map((scale) => `rm(${scale.name})\n`).join("");

  return [preamble, defs, load, cleanup].join("\n");
}

/**
 * Write the import script to an open sink. The sink is not ended.
 *
 * @throws PreconditionError for a missing or closed sink, before any write.
 * @throws StreamIOError when the sink rejects the write.
 */
export async function writeScript(survey: Survey, sink: Sink, csvPath: string, options: ScriptOptionsInput = {}): Promise<void> {
  assertWritable(sink, "script");
  await writeText(sink, renderScript(survey, csvPath, options), "script");
}
