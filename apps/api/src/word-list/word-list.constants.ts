export const WORD_LIST_MANAGER = "WORD_LIST_MANAGER";
