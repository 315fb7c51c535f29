import type { Column } from "./Schema";
import type { ColumnName, TableName, Value } from "./Types";

export interface CreateTableStmt {
    type: 'CREATE_TABLE';
    name: TableName;
    columns: Column[];
}

export interface InsertStmt {
    type: 'INSERT';
    table: TableName;
    values: Value[];
}

export interface SelectStmt {
    type: 'SELECT';
    table: TableName;
    columns?: ColumnName[]; // undefined means "*", all columns in schema order
}

export type Statement = CreateTableStmt | InsertStmt | SelectStmt;
