import { ChoiceKeyError } from "./choices";
import { parseTimestamp } from "./config";
import { resolveDynamicChoices } from "./dynamic";
import { decodeElement, type QuestionPayload } from "./elements";
import { StructuralParseError } from "./errors";
import { consoleLogger, type Logger, type LoggerOptions } from "./logger";
import { questionFromEmbeddedData, questionFromFixedScale, questionFromPayload } from "./question";
import type { Response } from "./response";
import { documentSchema, surveyEntrySchema, type BlockDescriptor, type FlowNode } from "./schemas";
import type { Question, Survey } from "./types";

const TRASH_BLOCK = "Trash";

type Block = {
  id: string;
  type: string;
  questionIds: string[];
};

// Parse-only state, dropped once the Survey is built.
type ParseState = {
  blocks: Map<string, Block>;
  blockOrder: string[];
  questions: Map<string, Question>;
  embeddedIds: string[];
  questionElements: number;
  expectedCount: number | null;
};

export type ParseOptions = LoggerOptions;

function decodeText(input: Uint8Array | string): string {
  const text = typeof input === "string" ? input : Buffer.from(input).toString("utf8");
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function readTimestamp(value: string | null | undefined, field: string, logger: Logger): Date | null {
  if (!value) return null;
  const date = parseTimestamp(value);
  if (!date) logger.warn("could not convert timestamp", { field, value });
  return date;
}

function addBlocks(state: ParseState, blocks: BlockDescriptor[]): void {
  for (const descriptor of blocks) {
    const questionIds = descriptor.BlockElements.flatMap((entry) =>
      entry.Type === "Question" && entry.QuestionID ? [entry.QuestionID] : []
    );
    state.blocks.set(descriptor.ID, { id: descriptor.ID, type: descriptor.Type, questionIds });
  }
}

function walkFlow(state: ParseState, nodes: FlowNode[]): void {
  for (const node of nodes) {
    if (node.Type === "EmbeddedData") {
      for (const field of node.EmbeddedData ?? []) {
        if (state.questions.has(field.Field) || state.embeddedIds.includes(field.Field)) continue;
        state.questions.set(field.Field, questionFromEmbeddedData(field));
        state.embeddedIds.push(field.Field);
      }
    } else if (node.ID) {
      state.blockOrder.push(node.ID);
    }
    // Randomizers, branches and groups nest their own flow; flatten in place.
    if (node.Flow) walkFlow(state, node.Flow);
  }
}

function addQuestion(state: ParseState, question: QuestionPayload, index: number): void {
  try {
    const built = question.shape === "fixed_scale" ? questionFromFixedScale(question.payload) : questionFromPayload(question.payload);
    state.questions.set(built.id, built);
    state.questionElements += 1;
  } catch (error) {
    if (error instanceof ChoiceKeyError) {
      throw new StructuralParseError("MalformedElement", error.message, {
        elementIndex: index,
        elementTag: "SQ",
        cause: error,
      });
    }
    throw error;
  }
}

function readCount(value: string | number | null, logger: Logger): number | null {
  if (value === null) return null;
  const count = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(count) || (typeof value === "string" && value.trim() === "")) {
    logger.warn("could not convert question count", { value });
    return null;
  }
  return count;
}

function emptyTrash(state: ParseState): void {
  for (const block of state.blocks.values()) {
    if (block.type !== TRASH_BLOCK) continue;
    for (const id of block.questionIds) state.questions.delete(id);
  }
}

function sortQuestions(state: ParseState, logger: Logger): string[] {
  const order: string[] = [];
  const seen = new Set<string>();
  for (const blockId of state.blockOrder) {
    const block = state.blocks.get(blockId);
    if (!block) {
      logger.warn("flow references an unknown block", { block: blockId });
      continue;
    }
    for (const id of block.questionIds) {
      if (seen.has(id) || !state.questions.has(id)) continue;
      seen.add(id);
      order.push(id);
    }
  }
  for (const id of state.embeddedIds) {
    if (seen.has(id)) continue;
    seen.add(id);
    order.push(id);
  }
  return order;
}

/**
 * Build a Survey from a survey-definition (QSF) document.
 *
 * @throws StructuralParseError when the document is not JSON, has no
 * SurveyEntry, or holds an element whose payload matches no known shape.
 */
export function parseSurvey(input: Uint8Array | string, options: ParseOptions = {}): Survey {
  const logger = options.logger ?? consoleLogger;

  let raw: unknown;
  try {
    raw = JSON.parse(decodeText(input));
  } catch (error) {
    throw new StructuralParseError("MalformedDocument", "definition document is not valid JSON", { cause: error });
  }

  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new StructuralParseError("MalformedDocument", "definition document is not a JSON object");
  }
  const entryRaw = "SurveyEntry" in raw ? raw.SurveyEntry : undefined;
  if (entryRaw === undefined || entryRaw === null) {
    throw new StructuralParseError("MissingMetadata", "definition document has no SurveyEntry object");
  }
  const entry = surveyEntrySchema.safeParse(entryRaw);
  if (!entry.success) {
    throw new StructuralParseError("MissingMetadata", "SurveyEntry is not a metadata object", { cause: entry.error });
  }
  const document = documentSchema.safeParse(raw);
  if (!document.success) {
    throw new StructuralParseError("MalformedDocument", "definition document has no SurveyElements array", {
      cause: document.error,
    });
  }

  const state: ParseState = {
    blocks: new Map(),
    blockOrder: [],
    questions: new Map(),
    embeddedIds: [],
    questionElements: 0,
    expectedCount: null,
  };

  document.data.SurveyElements.forEach((rawElement, index) => {
    const element = decodeElement(rawElement, index);
    switch (element.kind) {
      case "block":
        addBlocks(state, element.blocks);
        break;
      case "flow":
        walkFlow(state, element.flow);
        break;
      case "question":
        addQuestion(state, element.question, index);
        break;
      case "count":
        state.expectedCount = readCount(element.count, logger);
        break;
      case "unknown":
        logger.debug("skipping survey element", { tag: element.tag, index });
        break;
    }
  });

  // The advisory count includes trashed questions, so compare before emptying.
  if (state.expectedCount !== null && state.expectedCount !== state.questionElements) {
    logger.info("question count does not match the definition's count", {
      expected: state.expectedCount,
      found: state.questionElements,
    });
  }

  emptyTrash(state);
  const questionOrder = sortQuestions(state, logger);
  const questions = resolveDynamicChoices(state.questions, questionOrder, logger);

  return {
    title: entry.data.SurveyName,
    description: entry.data.SurveyDescription,
    status: entry.data.SurveyStatus,
    createdOn: readTimestamp(entry.data.SurveyCreationDate, "SurveyCreationDate", logger),
    launchedOn: readTimestamp(entry.data.SurveyStartDate, "SurveyStartDate", logger),
    modifiedOn: readTimestamp(entry.data.LastModified, "LastModified", logger),
    questionOrder,
    questions,
    responses: [],
  };
}

/**
 * Attach responses read from the response document.
 */
export function withResponses(survey: Survey, responses: readonly Response[]): Survey {
  return { ...survey, responses: [...responses] };
}
