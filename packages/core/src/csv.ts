import { stringify } from "csv-stringify/sync";

import { assertWritable, writeText, type Sink } from "./io";
import { questionColumns, renderQuestion } from "./question";
import type { Response } from "./response";
import type { Question, Survey } from "./types";

export const FIXED_COLUMNS = ["id", "finished", "progress", "duration"] as const;

export function orderedQuestions(survey: Survey): Question[] {
  return survey.questionOrder.flatMap((id) => {
    const question = survey.questions.get(id);
    return question ? [question] : [];
  });
}

export function csvHeader(survey: Survey): string[] {
  return [...FIXED_COLUMNS, ...orderedQuestions(survey).flatMap((question) => questionColumns(question).map((column) => column.name))];
}

export function csvRow(survey: Survey, response: Response): string[] {
  return [
    response.id,
    response.finished ? "TRUE" : "FALSE",
    String(response.progress),
    String(response.duration),
    ...orderedQuestions(survey).flatMap((question) => renderQuestion(question, response)),
  ];
}

export function csvRows(survey: Survey): string[][] {
  return survey.responses.map((response) => csvRow(survey, response));
}

export function renderCsv(survey: Survey): string {
  return stringify([csvHeader(survey), ...csvRows(survey)], { record_delimiter: "unix" });
}

/**
 * Write the survey's responses as CSV to an open sink. The sink is not ended.
 *
 * @throws PreconditionError for a missing or closed sink, before any write.
 * @throws StreamIOError when the sink rejects the write.
 */
export async function writeCsv(survey: Survey, sink: Sink): Promise<void> {
  assertWritable(sink, "csv");
  await writeText(sink, renderCsv(survey), "csv");
}
