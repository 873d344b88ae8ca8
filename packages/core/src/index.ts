export * from "./types";
export * from "./errors";
export * from "./logger";
export * from "./config";
export { makeChoice, orderedAnswers, orderedChoices, choiceLabels, choiceSuffix } from "./choices";
export { decodeElement, type SurveyElement, type QuestionPayload } from "./elements";
export {
  classifyQuestion,
  columnImportType,
  factorLevels,
  questionColumns,
  questionFromEmbeddedData,
  questionFromFixedScale,
  questionFromPayload,
  renderQuestion,
  type FactorLevels,
} from "./question";
export { resolveDynamicChoices } from "./dynamic";
export { parseSurvey, withResponses, type ParseOptions } from "./survey";
export { Response, normalizeAnswerKey, type ResponseFields } from "./response";
export { readResponses, readStream, type ReadOptions } from "./xml";
export { FIXED_COLUMNS, csvHeader, csvRow, csvRows, orderedQuestions, renderCsv, writeCsv } from "./csv";
export { planScript, renderScript, scaleName, writeScript, type ColumnClause, type Scale, type ScriptPlan } from "./script";
export type { Sink } from "./io";
