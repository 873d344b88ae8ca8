import { DataIntegrityError } from "./errors";

// _<loop index>_<stem>[-<n>], e.g. "_2_QID7_1" or "_1_QID7_TEXT-3".
const LOOP_KEY = /^_\d+_(QID\d+.*?)(-\d+)?$/;
// <prefix_>x<N>[_TEXT], e.g. "QID9_x3" or "QID9_x3_TEXT".
const DYNAMIC_KEY = /^(QID\d+_)x(\d+)(_TEXT)?$/;
// Timer sub-fields stay per loop iteration.
const TIMER_STEM = /_(CLICK|SUBMIT|COUNT)$/;

/**
 * Collapse a raw answer key from the response document to the key the
 * question model reads. Idempotent.
 */
export function normalizeAnswerKey(rawKey: string): string {
  const loop = LOOP_KEY.exec(rawKey);
  if (loop) {
    const stem = loop[1];
    return TIMER_STEM.test(stem) ? rawKey : rewriteDynamic(stem);
  }
  return rewriteDynamic(rawKey);
}

function rewriteDynamic(key: string): string {
  const dynamic = DYNAMIC_KEY.exec(key);
  return dynamic ? `${dynamic[1]}${dynamic[2]}${dynamic[3] ?? ""}` : key;
}

export type ResponseFields = {
  id: string;
  progress: number;
  duration: number;
  finished: boolean;
  recordedOn: Date | null;
};

export class Response {
  readonly id: string;
  readonly progress: number;
  readonly duration: number;
  readonly finished: boolean;
  readonly recordedOn: Date | null;
  private readonly answers = new Map<string, string>();

  constructor(fields: ResponseFields) {
    this.id = fields.id;
    this.progress = fields.progress;
    this.duration = fields.duration;
    this.finished = fields.finished;
    this.recordedOn = fields.recordedOn;
  }

  /**
   * Store an answer under its normalized key.
   *
   * @throws DataIntegrityError when the key already holds a different
   * non-empty answer.
   */
  addAnswer(rawKey: string, value: string): void {
    const key = normalizeAnswerKey(rawKey);
    const existing = this.answers.get(key);
    if (existing !== undefined && existing !== "") {
      if (value !== "") {
        throw new DataIntegrityError(key, rawKey, existing, value);
      }
      return;
    }
    this.answers.set(key, value);
  }

  answer(key: string): string | undefined {
    return this.answers.get(key);
  }

  get size(): number {
    return this.answers.size;
  }
}
