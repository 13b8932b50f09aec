export { OllamaChatClient, DEFAULT_CHAT_MODEL, type OllamaChatOptions } from "./ollamaChat.js";
