import { createHash } from "node:crypto";
import { Writable } from "node:stream";

import { describe, expect, it } from "vitest";
import { ZodError } from "zod";

import { makeChoice } from "../src/choices";
import { csvHeader } from "../src/csv";
import { PreconditionError } from "../src/errors";
import { silentLogger } from "../src/logger";
import { planScript, renderScript, scaleName, writeScript } from "../src/script";
import { parseSurvey } from "../src/survey";
import { blocks, flow, mc, qsf, sq } from "./fixtures";

function scaleOf(labels: string[]): string {
  return `scale_${createHash("sha1").update(JSON.stringify(labels), "utf8").digest("hex")}`;
}

function surveyOf(elements: unknown[], questionIds: string[]) {
  return parseSurvey(qsf([blocks([{ id: "BL_1", questions: questionIds }]), flow([{ ID: "BL_1" }]), ...elements]), {
    logger: silentLogger,
  });
}

const abcName = scaleOf(["A", "B", "C", "No response"]);

describe("scale names", () => {
  it("hash the ordered labels", () => {
    expect(scaleName(["A", "B", "C", "No response"].map((l) => makeChoice(l, l)))).toBe(abcName);
  });

  it("ignore variable names", () => {
    const plain = [makeChoice("1", "A"), makeChoice("2", "B")];
    const named = [makeChoice("1", "A", "a"), makeChoice("2", "B", "b")];
    expect(scaleName(named)).toBe(scaleName(plain));
  });
});

describe("import script", () => {
  it("declares one shared scale for identical label sets", () => {
    const survey = surveyOf([mc("QID1", "Q1", ["A", "B", "C"]), mc("QID2", "Q2", ["A", "B", "C"])], ["QID1", "QID2"]);
    expect(renderScript(survey, "out/data.csv")).toBe(
      [
        "# Generated by qsf-export 0.1.0",
        "library(readr)",
        "",
        'input_path <- "out/data.csv"',
        `${abcName} <- c("A", "B", "C", "No response")`,
        "",
        'message(sprintf("Reading %s...", input_path))',
        "data <- read_csv(input_path, col_types = cols(",
        "\tid = col_character(),",
        "\tfinished = col_logical(),",
        "\tprogress = col_integer(),",
        "\tduration = col_integer(),",
        `\tQ1 = col_factor(levels = ${abcName}),`,
        `\tQ2 = col_factor(levels = ${abcName})`,
        "))",
        "",
        "rm(input_path)",
        `rm(${abcName})`,
        "",
      ].join("\n")
    );
  });

  it("keeps differently ordered labels apart and sorts scales by name", () => {
    const survey = surveyOf(
      [mc("QID1", "Q1", ["A", "B", "C"]), mc("QID2", "Q2", ["C", "B", "A"]), mc("QID3", "Q3", ["A", "B", "C"])],
      ["QID1", "QID2", "QID3"]
    );
    const plan = planScript(survey);
    const cbaName = scaleOf(["C", "B", "A", "No response"]);
    expect(plan.scales.map((s) => s.name)).toEqual([abcName, cbaName].sort());
    expect(plan.clauses.slice(4).map((c) => c.scale)).toEqual([abcName, cbaName, abcName]);

    const script = renderScript(survey, "data.csv");
    expect(script.split("\n").filter((line) => line.startsWith("rm("))).toEqual(["rm(input_path)", ...[abcName, cbaName].sort().map((n) => `rm(${n})`)]);
  });

  it("keeps label sets apart when their concatenations coincide", () => {
    const survey = surveyOf([mc("QID1", "Q1", ["AB", "C"]), mc("QID2", "Q2", ["A", "BC"])], ["QID1", "QID2"]);
    const plan = planScript(survey);
    const first = scaleOf(["AB", "C", "No response"]);
    const second = scaleOf(["A", "BC", "No response"]);
    expect(plan.scales.map((s) => s.name)).toEqual([first, second].sort());
    expect(plan.clauses.slice(4).map((c) => c.scale)).toEqual([first, second]);
  });

  it("has one clause per csv column, in header order", () => {
    const survey = surveyOf(
      [
        mc("QID1", "Q1", ["A", { label: "B", text: true }]),
        mc("QID4", "Q4", ["x", "y"], "MAVR"),
        sq({ QuestionID: "QID5", DataExportTag: "Q5", QuestionType: "TE", Selector: "SL" }),
        sq({ QuestionID: "QID6", DataExportTag: "Q6", QuestionType: "Timing", Selector: "PageTimer" }),
        sq({ QuestionID: "QID7", DataExportTag: "rank", QuestionType: "RO", Selector: "DND", Choices: { "1": { Display: "p" }, "2": { Display: "q" } }, ChoiceOrder: [1, 2] }),
      ],
      ["QID1", "QID4", "QID5", "QID6", "QID7"]
    );
    const plan = planScript(survey);
    expect(plan.clauses.map((c) => c.column)).toEqual(csvHeader(survey));
    expect(plan.clauses.map((c) => c.type)).toEqual([
      "character",
      "logical",
      "integer",
      "integer",
      "factor",
      "character",
      "logical",
      "logical",
      "character",
      "double",
      "double",
      "double",
      "integer",
      "factor",
      "factor",
    ]);
    const rankScale = scaleOf(["1", "2", "No response"]);
    expect(renderScript(survey, "d.csv")).toContain(`\trank_1 = col_factor(levels = ${rankScale}, ordered = TRUE),\n`);
  });

  it("declares factors without levels when a question has no choices", () => {
    const survey = surveyOf(
      [mc("QID2", "Q2", [], "SAVR", { Choices: [], DynamicChoices: { Locator: "q://QID9/SelectedChoices", Type: "SelectedChoices" } })],
      ["QID2"]
    );
    const script = renderScript(survey, "d.csv");
    expect(script).toContain("\tQ2 = col_factor()\n");
    expect(planScript(survey).scales).toEqual([]);
  });

  it("escapes R strings and quotes non-syntactic names", () => {
    const survey = surveyOf([mc("QID1", "my question", ['say "hi"', "back\\slash"])], ["QID1"]);
    const script = renderScript(survey, 'C:\\data\\"x".csv');
    expect(script).toContain('input_path <- "C:\\\\data\\\\\\"x\\".csv"\n');
    expect(script).toContain('c("say \\"hi\\"", "back\\\\slash", "No response")');
    expect(script).toContain("\t`my question` = col_factor(");
  });

  it("takes the tool name and library from options", () => {
    const survey = surveyOf([], []);
    const script = renderScript(survey, "d.csv", { toolName: "exporter", toolVersion: "9.9.9", library: "vroom" });
    expect(script.startsWith("# Generated by exporter 9.9.9\nlibrary(vroom)\n")).toBe(true);
    expect(() => renderScript(survey, "d.csv", { library: "not a package" })).toThrow(ZodError);
  });
});

describe("script sinks", () => {
  it("writes the script to an open sink", async () => {
    const survey = surveyOf([mc("QID1", "Q1", ["A"])], ["QID1"]);
    const chunks: string[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString("utf8"));
        callback();
      },
    });
    await writeScript(survey, sink, "d.csv");
    expect(chunks.join("")).toBe(renderScript(survey, "d.csv"));
  });

  it("rejects a missing sink", async () => {
    await expect(writeScript(surveyOf([], []), undefined, "d.csv")).rejects.toThrow(new PreconditionError("script sink cannot be null"));
  });
});
