export { Session } from "./session";
export type { SessionComponents } from "./session";
export { createSession, destroySession } from "./factories";
export type { CreateSessionOptions } from "./factories";
export { SerializedSession } from "./serialized";
export type { Logger, SessionCallbacks, SessionOperation } from "./types";
