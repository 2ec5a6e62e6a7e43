export { DiagramSource } from "./diagram-source/source";
export type { DiagramFile, ReadOptions } from "./diagram-source/types";
export { ArtifactWriter } from "./artifact-writer/writer";
export type { WriteResult, WrittenArtifact } from "./artifact-writer/types";
export { errorCode, errorMessage, toUserMessage } from "./errors";
