export const CLI_NAME = "tree-inventory";

// Lives in the top-level directory of every inventoried tree.
export const RECORD_FILE_NAME = "tree_checksum.json";
