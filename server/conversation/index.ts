export { renderCatalog, formatContact } from "./catalog";
export { streamReply, buildConversationPrompt } from "./streamReply";
