export type { ChatTurn, ChatSessionOptions } from "./session.js";

export { getResponse } from "./responder.js";
export { ChatSession } from "./session.js";
