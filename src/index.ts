export type { CreateTableStmt, InsertStmt, SelectStmt, Statement } from "./engine/AST";
export { Catalog, type CatalogData } from "./engine/Catalog";
export { Database } from "./engine/Database";
export {
    CatalogError, ExecError, LexError, ParseError, SqlError, StorageError, ValidationError,
} from "./engine/Errors";
export { execute, run, type Output } from "./engine/Executor";
export { lex } from "./engine/Lexer";
export { parse, Parser } from "./engine/Parser";
export { Row } from "./engine/Row";
export { column, Schema, type Column } from "./engine/Schema";
export {
    deserializeTable, loadTable, parseSnapshot, saveTable, serializeTable,
    type TableSnapshot, type ValueSnapshot,
} from "./engine/Storage";
export { Table } from "./engine/Table";
export type { Token, TokenType } from "./engine/Token";
export { ColumnName, formatValue, matches, TableName, Value, type DataType } from "./engine/Types";
