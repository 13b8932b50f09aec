export type DocumentType =
  | "champion"
  | "item"
  | "game_mechanics"
  | "items"
  | "ranked"
  | "lore"
  | "champion_rotation";

export type SourceName = "data_dragon" | "web_scraper" | "riot_api" | "sample";

export type ChunkId = string;
export type DocumentId = string;
export type CollectionId = string;

export interface DocumentMetadata {
  type: DocumentType;
  source: SourceName;
  champion?: string;
  role?: string;
  version?: string;
  url?: string;
  region?: string;
}

export interface Document {
  text: string;
  metadata: DocumentMetadata;
}

export interface Chunk {
  id: ChunkId;
  documentId: DocumentId;
  /** Position of the chunk within its document. */
  index: number;
  /** Offset of `text` in the parent document's text. */
  start: number;
  text: string;
  metadata: DocumentMetadata;
}

export interface EmbeddedChunk {
  chunk: Chunk;
  vector: number[];
}

export interface RetrievedChunk {
  chunk: Chunk;
  similarity: number;
}

/** Retrieval result as returned to API callers. */
export interface ContextDocument {
  content: string;
  metadata: DocumentMetadata;
  score: number;
}

export type IndexWriteMode = "create" | "refresh" | "append";

export interface IngestionResult {
  documents: number;
  chunks: number;
  mode: IndexWriteMode;
}

export type JobStatus = "queued" | "running" | "completed" | "failed";

export interface PipelineJob {
  job_id: string;
  status: JobStatus;
  message: string;
  result: IngestionResult | null;
  error: string | null;
  created_at: string;
  updated_at: string;
  started_at: string | null;
  completed_at: string | null;
}

/** Payload carried through the broker for one ingestion request. */
export interface QueuedJob {
  jobId: string;
  sources: string[] | null;
  forceRefresh: boolean;
}

export type ConversationRole = "user" | "assistant";

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

export interface QueryRequest {
  question: string;
  history?: ConversationTurn[];
  k?: number;
}

export interface QueryResult {
  answer: string;
  context: ContextDocument[];
  toolsUsed: string[];
}

/* -----------------------------
   Model collaborators
------------------------------ */
export interface Embedder {
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
}

export type ChatRole = "system" | "user" | "assistant" | "tool";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ToolSpec {
  name: string;
  description: string;
  /** JSON schema of the arguments object. */
  parameters: Record<string, unknown>;
}

export interface ToolCall {
  name: string;
  args: Record<string, unknown>;
  /** Set when the model's arguments could not be decoded; `args` is then empty. */
  argumentsError?: string;
}

export interface ChatRequest {
  messages: ChatMessage[];
  tools?: ToolSpec[];
}

export interface ChatResult {
  content: string;
  toolCalls: ToolCall[];
}

export interface ChatModel {
  readonly model: string;
  chat(request: ChatRequest): Promise<ChatResult>;
}
