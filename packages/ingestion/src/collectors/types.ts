import type { Document, SourceName } from "@lolqa/core";

export type CollectorValidation = { ok: true } | { ok: false; reason: string };

export interface DocumentCollector {
  readonly name: SourceName;
  collect(): Promise<Document[]>;
  validate(): CollectorValidation;
}
