export const DATA_DIR = "data";
export const CATALOG_FILE = "catalog.json";
export const SNAPSHOT_VERSION = 1;

export const PROMPT = "sql> ";

export const KEYWORDS: readonly string[] = [
    "SELECT", "INSERT", "UPDATE", "DELETE", "CREATE", "TABLE", "VALUES",
];

export const SYMBOLS: readonly string[] = ["(", ")", ",", ";", "*"];

// i64 bounds
export const INT_MIN = -(2n ** 63n);
export const INT_MAX = 2n ** 63n - 1n;
