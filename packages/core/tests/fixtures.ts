import { vi } from "vitest";

import type { Logger } from "../src/logger";

type ChoiceInput = string | { label: string; text?: boolean };

export function keyedChoices(inputs: ChoiceInput[]): Record<string, { Display: string; TextEntry?: string }> {
  const out: Record<string, { Display: string; TextEntry?: string }> = {};
  inputs.forEach((input, i) => {
    const { label, text } = typeof input === "string" ? { label: input, text: false } : input;
    out[String(i + 1)] = text ? { Display: label, TextEntry: "true" } : { Display: label };
  });
  return out;
}

export function sq(payload: Record<string, unknown>) {
  return { SurveyID: "SV_test", Element: "SQ", PrimaryAttribute: payload.QuestionID, SecondaryAttribute: "", Payload: payload };
}

export function mc(id: string, tag: string, choices: ChoiceInput[], selector = "SAVR", extra: Record<string, unknown> = {}) {
  return sq({
    QuestionID: id,
    DataExportTag: tag,
    QuestionType: "MC",
    Selector: selector,
    SubSelector: "TX",
    QuestionText: `${tag} text`,
    Choices: keyedChoices(choices),
    ChoiceOrder: choices.map((_, i) => i + 1),
    ...extra,
  });
}

export function blocks(payload: Array<{ id: string; type?: string; questions: string[] }>) {
  return {
    SurveyID: "SV_test",
    Element: "BL",
    Payload: payload.map((b) => ({
      Type: b.type ?? "Standard",
      ID: b.id,
      BlockElements: b.questions.map((q) => ({ Type: "Question", QuestionID: q })),
    })),
  };
}

export function flow(nodes: unknown[]) {
  return { SurveyID: "SV_test", Element: "FL", Payload: { Type: "Root", FlowID: "FL_1", Flow: nodes } };
}

export const surveyEntry = {
  SurveyID: "SV_test",
  SurveyName: "Test survey",
  SurveyDescription: null,
  SurveyStatus: "Active",
  SurveyStartDate: "2024-03-01 09:30:00",
  SurveyCreationDate: "2024-02-28 17:05:12",
  LastModified: "2024-03-02 08:00:00",
};

export function qsf(elements: unknown[]): string {
  return JSON.stringify({ SurveyEntry: surveyEntry, SurveyElements: elements });
}

// One single-choice question (3 choices) and one multi-select question
// (4 choices, the 2nd and 4th with free text), plus a trashed question.
export const basicQsf = qsf([
  blocks([
    { id: "BL_1", questions: ["QID1", "QID4"] },
    { id: "BL_trash", type: "Trash", questions: ["QID9"] },
  ]),
  flow([{ ID: "BL_1", Type: "Block", FlowID: "FL_2" }]),
  { SurveyID: "SV_test", Element: "QC", PrimaryAttribute: "Survey Question Count", SecondaryAttribute: "3" },
  mc("QID1", "Q1", ["Red", "Green", "Blue"]),
  mc("QID4", "Q4", ["A", { label: "B", text: true }, "C", { label: "D", text: true }], "MAVR"),
  mc("QID9", "Q9", ["Old"]),
]);

export const basicXml = `<?xml version="1.0" encoding="UTF-8"?>
<Responses>
  <Response>
    <startDate>2024-03-05 10:00:00</startDate>
    <_recordId>R_1</_recordId>
    <progress>100</progress>
    <duration>60</duration>
    <finished>1</finished>
    <recordedDate>2024-03-05 10:01:00</recordedDate>
    <QID1>2</QID1>
    <QID4_1>1</QID4_1>
    <QID4_2>1</QID4_2>
    <QID4_2_TEXT>other, with comma</QID4_2_TEXT>
    <QID4_4></QID4_4>
  </Response>
  <Response>
    <_recordId>R_2</_recordId>
    <progress>100</progress>
    <duration>45</duration>
    <finished>true</finished>
    <recordedDate>2024-03-05 11:00:00</recordedDate>
    <QID1>3</QID1>
    <QID4_3>1</QID4_3>
    <QID4_4>1</QID4_4>
    <QID4_4_TEXT>line one
line two</QID4_4_TEXT>
  </Response>
  <Response>
    <_recordId>R_3</_recordId>
    <progress>40</progress>
    <duration>12</duration>
    <finished>0</finished>
    <recordedDate>2024-03-05 12:00:00</recordedDate>
    <QID1>1</QID1>
  </Response>
</Responses>
`;

export function responsesXml(bodies: string[]): string {
  return `<Responses>${bodies.map((body) => `<Response>${body}</Response>`).join("")}</Responses>`;
}

export function spyLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
  } satisfies Logger;
  return logger;
}
