// Re-export utilities

export type { MergeFileRequest, MergeFileResult, SpawnResult, Spawner } from "./git.js";
export { defaultSpawner, gitMergeFile, mergeFileArgs } from "./git.js";
export type { NormalizedText } from "./text.js";
export { imitateLineEndings, normalizeLineEndings } from "./text.js";
