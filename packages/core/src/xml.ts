import type { Readable } from "node:stream";

import { XMLParser, XMLValidator } from "fast-xml-parser";

import { parseTimestamp } from "./config";
import { StreamIOError, StructuralParseError } from "./errors";
import { consoleLogger, type Logger, type LoggerOptions } from "./logger";
import { Response } from "./response";

const ROOT_TAG = "Responses";
const RESPONSE_TAG = "Response";
const TEXT_KEY = "#text";
const ATTRIBUTES_KEY = ":@";

const FIELD_ID = "_recordId";
const FIELD_PROGRESS = "progress";
const FIELD_DURATION = "duration";
const FIELD_FINISHED = "finished";
const FIELD_RECORDED = "recordedDate";
const FIXED_FIELDS = new Set([FIELD_ID, FIELD_PROGRESS, FIELD_DURATION, FIELD_FINISHED, FIELD_RECORDED]);

const TRUE_VALUES = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSE_VALUES = new Set(["0", "f", "F", "FALSE", "false", "False"]);

// preserveOrder output: every element is { [tag]: children }, text is { "#text": value }.
type OrderedNode = Record<string, unknown>;

type ChildElement = {
  tag: string;
  text: string;
  children: OrderedNode[];
};

export type ReadOptions = LoggerOptions;

function asNodes(value: unknown): OrderedNode[] {
  if (!Array.isArray(value)) return [];
  return value.filter((node): node is OrderedNode => typeof node === "object" && node !== null && !Array.isArray(node));
}

function elementsOf(nodes: OrderedNode[]): ChildElement[] {
  const elements: ChildElement[] = [];
  for (const node of nodes) {
    const tag = Object.keys(node).find((key) => key !== TEXT_KEY && key !== ATTRIBUTES_KEY);
    if (tag === undefined) continue;
    const children = asNodes(node[tag]);
    elements.push({ tag, text: textOf(children), children });
  }
  return elements;
}

function textOf(children: OrderedNode[]): string {
  let text = "";
  for (const child of children) {
    const value = child[TEXT_KEY];
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      text += String(value);
    }
  }
  return text;
}

class FieldReader {
  constructor(
    private readonly fields: Map<string, string>,
    private readonly record: string,
    private readonly logger: Logger
  ) {}

  text(name: string): string {
    const value = this.fields.get(name);
    if (value === undefined) {
      this.logger.debug("response field missing", { record: this.record, field: name });
      return "";
    }
    return value;
  }

  int(name: string): number {
    const value = this.fields.get(name);
    if (value === undefined) {
      this.logger.debug("response field missing", { record: this.record, field: name });
      return 0;
    }
    if (!/^[+-]?\d+$/.test(value.trim())) {
      this.logger.warn("could not convert response field to int", { record: this.record, field: name, value });
      return 0;
    }
    return Number.parseInt(value, 10);
  }

  bool(name: string): boolean {
    const value = this.fields.get(name);
    if (value === undefined) {
      this.logger.debug("response field missing", { record: this.record, field: name });
      return false;
    }
    const trimmed = value.trim();
    if (TRUE_VALUES.has(trimmed)) return true;
    if (!FALSE_VALUES.has(trimmed)) {
      this.logger.warn("could not convert response field to bool", { record: this.record, field: name, value });
    }
    return false;
  }

  time(name: string): Date | null {
    const value = this.fields.get(name);
    if (value === undefined) {
      this.logger.debug("response field missing", { record: this.record, field: name });
      return null;
    }
    const date = parseTimestamp(value);
    if (!date) {
      this.logger.warn("could not convert response field to time", { record: this.record, field: name, value });
    }
    return date;
  }
}

function readResponse(element: ChildElement, index: number, logger: Logger): Response {
  const children = elementsOf(element.children);
  const fields = new Map<string, string>();
  for (const child of children) {
    if (FIXED_FIELDS.has(child.tag) && !fields.has(child.tag)) fields.set(child.tag, child.text);
  }

  const id = fields.get(FIELD_ID) ?? "";
  const reader = new FieldReader(fields, id || `#${index + 1}`, logger);
  const response = new Response({
    id: reader.text(FIELD_ID),
    progress: reader.int(FIELD_PROGRESS),
    duration: reader.int(FIELD_DURATION),
    finished: reader.bool(FIELD_FINISHED),
    recordedOn: reader.time(FIELD_RECORDED),
  });

  for (const child of children) {
    if (FIXED_FIELDS.has(child.tag)) continue;
    response.addAnswer(child.tag, child.text);
  }
  return response;
}

/**
 * Read every Response element of a response-export document, in document
 * order.
 *
 * @throws StructuralParseError for XML that is not well formed or has no
 * Responses root.
 * @throws DataIntegrityError when two answers collapse onto one key.
 */
export function readResponses(input: Uint8Array | string, options: ReadOptions = {}): Response[] {
  const logger = options.logger ?? consoleLogger;
  const xml = typeof input === "string" ? input : Buffer.from(input).toString("utf8");

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new StructuralParseError("MalformedDocument", `response document is not well-formed XML: ${msg} (line ${line}, column ${col})`);
  }

  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: true,
    parseTagValue: false,
    trimValues: true,
    ignoreDeclaration: true,
  });
  const document = asNodes(parser.parse(xml));

  const root = elementsOf(document).find((element) => element.tag === ROOT_TAG);
  if (!root) {
    throw new StructuralParseError("MalformedDocument", `response document has no <${ROOT_TAG}> root`);
  }

  return elementsOf(root.children)
    .filter((element) => element.tag === RESPONSE_TAG)
    .map((element, index) => readResponse(element, index, logger));
}

/**
 * Buffer an already-open stream. The caller keeps ownership of it.
 */
export async function readStream(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of stream) {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
    }
  } catch (error) {
    throw new StreamIOError("could not read input stream", error);
  }
  return Buffer.concat(chunks);
}
