import crypto from "node:crypto";
import { ValidationError, type Chunk, type Document, type DocumentId } from "@lolqa/core";

export interface ChunkingOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export const DEFAULT_CHUNKING: ChunkingOptions = { chunkSize: 1000, chunkOverlap: 200 };

function sha256(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

function isSpace(ch: string | undefined): boolean {
  return ch !== undefined && /\s/.test(ch);
}

export function documentId(doc: Document): DocumentId {
  const md = doc.metadata;
  return sha256(`${md.source}:${md.type}:${md.champion ?? ""}:${md.url ?? ""}:${sha256(doc.text)}`);
}

export function chunkId(docId: DocumentId, index: number, text: string): string {
  return sha256(`${docId}:${index}:${sha256(text)}`);
}

/**
 * End of the window starting at `from`: the last paragraph break, else line
 * break, else sentence end, else space, else a hard cut at `from + size`.
 * Only separators past `floor` count. Null when the window has separators but
 * none past `floor`.
 */
function findBreak(text: string, from: number, size: number, floor: number): number | null {
  const limit = from + size;
  const min = Math.max(floor, from);
  // one char past the window so a separator right at the limit counts
  const window = text.slice(from, limit + 1);
  let earlier = false;

  const accept = (rel: number): number | null => {
    if (rel <= 0) return null;
    if (from + rel > min) return from + rel;
    earlier = true;
    return null;
  };

  const paragraph = accept(window.lastIndexOf("\n\n"));
  if (paragraph !== null) return paragraph;

  const line = accept(window.lastIndexOf("\n"));
  if (line !== null) return line;

  let sentence = -1;
  for (const m of window.matchAll(/[.!?](?=\s)/g)) {
    if (m.index !== undefined && m.index + 1 <= size) sentence = m.index + 1;
  }
  const sentenceEnd = accept(sentence);
  if (sentenceEnd !== null) return sentenceEnd;

  const space = accept(window.lastIndexOf(" "));
  if (space !== null) return space;

  return earlier ? null : limit;
}

function validateOptions(opts: ChunkingOptions): void {
  if (!Number.isInteger(opts.chunkSize) || opts.chunkSize <= 0) {
    throw new ValidationError(`chunkSize must be a positive integer, got ${opts.chunkSize}`);
  }
  if (!Number.isInteger(opts.chunkOverlap) || opts.chunkOverlap < 0) {
    throw new ValidationError(`chunkOverlap must be a non-negative integer, got ${opts.chunkOverlap}`);
  }
  if (opts.chunkOverlap >= opts.chunkSize) {
    throw new ValidationError(
      `chunkOverlap (${opts.chunkOverlap}) must be smaller than chunkSize (${opts.chunkSize})`
    );
  }
}

/**
 * Greedy split of one document. Every chunk is an exact slice of the text, at most
 * `chunkSize` long, and every non-whitespace character lands in some chunk.
 */
export function splitDocument(doc: Document, opts: ChunkingOptions = DEFAULT_CHUNKING): Chunk[] {
  validateOptions(opts);
  const { chunkSize, chunkOverlap } = opts;
  const text = doc.text;
  const n = text.length;
  const docId = documentId(doc);

  const chunks: Chunk[] = [];
  let pos = 0;
  // first non-space position after the previous chunk; the next chunk must reach past it
  let floor = 0;

  while (pos < n) {
    while (pos < n && isSpace(text[pos])) pos++;
    if (pos >= n) break;

    let end: number;
    if (n - pos <= chunkSize) {
      end = n;
    } else {
      const found = findBreak(text, pos, chunkSize, floor);
      if (found === null) {
        // every break in reach is behind the previous chunk: drop the overlap
        pos = floor;
        continue;
      }
      end = found;
    }

    let stop = end;
    while (stop > pos && isSpace(text[stop - 1])) stop--;

    const body = text.slice(pos, stop);
    const index = chunks.length;
    chunks.push({
      id: chunkId(docId, index, body),
      documentId: docId,
      index,
      start: pos,
      text: body,
      metadata: doc.metadata,
    });

    if (end >= n) break;

    floor = end;
    while (floor < n && isSpace(text[floor])) floor++;

    // step back into the window for overlap, then forward to a word boundary if one is there
    let next = Math.max(end - chunkOverlap, pos + 1);
    if (next < end && !isSpace(text[next - 1])) {
      let j = next;
      while (j < end && !isSpace(text[j])) j++;
      if (j < end) next = j;
    }
    pos = next;
  }

  return chunks;
}

export function splitDocuments(documents: Document[], opts: ChunkingOptions = DEFAULT_CHUNKING): Chunk[] {
  validateOptions(opts);
  return documents.flatMap((doc) => splitDocument(doc, opts));
}
