export { SQLiteConversationStore } from "./conversation-store.js";
