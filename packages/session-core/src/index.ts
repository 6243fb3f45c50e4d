export * from "./types";
export { CadSession, defaultCadSessionConfig, handToWorld, snapToGrid } from "./CadSession";
export { DEFAULT_MAX_CARRIED_COMMANDS, SnapshotChannel, coalesceCommands, supersedingKey } from "./SnapshotChannel";
