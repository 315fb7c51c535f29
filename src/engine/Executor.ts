import type { CreateTableStmt, InsertStmt, SelectStmt, Statement } from "./AST";
import type { Database } from "./Database";
import { lex } from "./Lexer";
import { parse } from "./Parser";
import type { Row } from "./Row";
import { Schema } from "./Schema";
import { assertNever, type ColumnName } from "./Types";

export type Output =
    | { kind: "none" }
    | { kind: "rows"; columns: ColumnName[]; rows: Row[] };

const NONE: Output = { kind: "none" };

export function execute(stmt: Statement, db: Database): Output {
    switch (stmt.type) {
        case 'CREATE_TABLE': return execCreate(stmt, db);
        case 'INSERT': return execInsert(stmt, db);
        case 'SELECT': return execSelect(stmt, db);
        default: return assertNever(stmt);
    }
}

/** Lexes, parses and executes one statement. */
export function run(sql: string, db: Database): Output {
    return execute(parse(lex(sql)), db);
}

function execCreate(stmt: CreateTableStmt, db: Database): Output {
    db.createTable(stmt.name, Schema.create(stmt.columns));
    return NONE;
}

function execInsert(stmt: InsertStmt, db: Database): Output {
    db.insert(stmt.table, stmt.values);
    return NONE;
}

function execSelect(stmt: SelectStmt, db: Database): Output {
    const table = db.require(stmt.table);
    const rows = table.select(stmt.columns);
    const columns = stmt.columns ?? table.schema.columns.map(col => col.name);
    return { kind: "rows", columns: [...columns], rows };
}
