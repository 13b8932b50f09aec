import type { ChatMessage, ContextDocument, ConversationTurn } from "@lolqa/core";

export const REFUSAL = "I don't have that information in my knowledge base";

const GROUNDING_RULES = [
  "CRITICAL INSTRUCTIONS:",
  "- You MUST ONLY use the information provided in the Context section below",
  "- DO NOT use any information from your training data or general knowledge",
  `- If the answer is not in the provided context, explicitly say "${REFUSAL}"`,
  "- The context provided is the most up-to-date and accurate information available",
];

const HISTORY_RULE =
  "- Pay attention to the conversation history. If the user refers to something mentioned earlier " +
  '(like "he", "she", "it", "this champion", etc.), use the conversation history to understand ' +
  "what they're referring to";

/** `[Source i]` blocks, numbered from 1, separated by a blank line. */
export function formatContext(documents: ContextDocument[]): string {
  return documents.map((d, i) => `[Source ${i + 1}]\n${d.content}\n`).join("\n");
}

export function formatHistory(history: ConversationTurn[]): string {
  return history
    .map((turn) => `${turn.role === "user" ? "User" : "Assistant"}: ${turn.content}`)
    .join("\n");
}

export function buildAnswerMessages(params: {
  question: string;
  context: string;
  history?: ConversationTurn[];
}): ChatMessage[] {
  const hasHistory = (params.history?.length ?? 0) > 0;

  const system = [
    "You are a helpful assistant specialized in League of Legends game knowledge.",
    "",
    ...GROUNDING_RULES,
    ...(hasHistory ? [HISTORY_RULE] : []),
    "",
    `Context: ${params.context}`,
  ].join("\n");

  const user =
    hasHistory && params.history
      ? [
          `Conversation History:\n${formatHistory(params.history)}`,
          "",
          `Current Question: ${params.question}`,
          "",
          "Provide a detailed and helpful answer about League of Legends using ONLY the context provided above. " +
            "If the question references something from the conversation history, make sure to use that context:",
        ].join("\n")
      : [
          `Question: ${params.question}`,
          "",
          "Provide a detailed and helpful answer about League of Legends using ONLY the context provided above:",
        ].join("\n");

  return [
    { role: "system", content: system },
    { role: "user", content: user },
  ];
}

/**
 * Second round after tool dispatch. Same grounding contract, but the only
 * evidence is the tool output.
 */
export function buildToolAnswerMessages(params: {
  question: string;
  toolResults: string;
}): ChatMessage[] {
  const system = [
    "You are a helpful assistant specialized in League of Legends game knowledge.",
    "",
    "CRITICAL INSTRUCTIONS:",
    "- You MUST ONLY use the information provided in the Tool Results section below",
    "- DO NOT use any information from your training data or general knowledge",
    "- A line starting with \"Error:\" means that tool failed; answer from the other results if you can",
    `- If the answer is not in the tool results, explicitly say "${REFUSAL}"`,
    "",
    `Tool Results:\n${params.toolResults}`,
  ].join("\n");

  return [
    { role: "system", content: system },
    { role: "user", content: `Question: ${params.question}` },
  ];
}
