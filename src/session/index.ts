// pattern: Functional Core

export { createSession, type Session, type SessionDependencies } from "./session.js";
