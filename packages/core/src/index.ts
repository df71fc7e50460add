export * from "./types/word-list";
