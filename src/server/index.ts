export { buildServer, startServer } from "./app";
export { type Container, type ContainerOptions, createContainer } from "./container";
export { RETRY_AFTER_SECONDS, sendServiceError, statusForError } from "./errors";
