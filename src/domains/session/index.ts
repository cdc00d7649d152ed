export { SessionDomain } from "./session";
export type { Session } from "./session.types";
