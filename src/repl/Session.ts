import type { Statement } from "../engine/AST";
import type { Catalog } from "../engine/Catalog";
import type { Database } from "../engine/Database";
import { isSqlError, StorageError } from "../engine/Errors";
import { execute, type Output } from "../engine/Executor";
import { Parser } from "../engine/Parser";
import { formatValue } from "../engine/Types";

export type LineResult =
    | { type: 'exit' }
    | { type: 'skip' }
    | { type: 'output'; lines: string[] }
    // The statement took effect in memory but could not be written out.
    | { type: 'unsaved'; lines: string[]; message: string }
    | { type: 'error'; message: string };

export function formatOutput(output: Output): string[] {
    if (output.kind === "none") return ["OK"];

    const lines = [output.columns.map(col => col.value).join(" | ")];
    for (const row of output.rows) {
        lines.push(row.values.map(formatValue).join(" | "));
    }
    lines.push(`(${output.rows.length} ${output.rows.length === 1 ? "row" : "rows"})`);
    return lines;
}

/**
 * One interactive session over a database. When a catalog is given, every
 * successful CREATE TABLE or INSERT is written through to it. A failed write
 * does not undo the statement; the line comes back as `unsaved`.
 */
export class Session {
    constructor(private db: Database, private catalog?: Catalog) { }

    async handle(line: string): Promise<LineResult> {
        const input = line.trim();
        if (input === "") return { type: 'skip' };

        const command = input.toLowerCase();
        if (command === "exit" || command === "quit") return { type: 'exit' };
        if (command === ".tables") return { type: 'output', lines: this.listTables() };

        const ran = this.run(input);
        if (ran.type === 'error') return ran;

        const { stmt, lines } = ran;
        if (this.catalog && stmt.type !== 'SELECT') {
            const name = stmt.type === 'CREATE_TABLE' ? stmt.name : stmt.table;
            try {
                await this.catalog.saveTable(this.db, this.db.require(name));
            } catch (e) {
                if (!(e instanceof StorageError)) throw e;
                return { type: 'unsaved', lines, message: e.message };
            }
        }
        return { type: 'output', lines };
    }

    private run(input: string): { type: 'done'; stmt: Statement; lines: string[] } | { type: 'error'; message: string } {
        try {
            const stmt = Parser.fromSql(input).parse();
            return { type: 'done', stmt, lines: formatOutput(execute(stmt, this.db)) };
        } catch (e) {
            if (!isSqlError(e)) throw e;
            return { type: 'error', message: e.message };
        }
    }

    private listTables(): string[] {
        const tables = this.db.tables();
        if (tables.length === 0) return ["(no tables)"];
        return tables.map(t => `${t.name.value} (${t.rowCount} ${t.rowCount === 1 ? "row" : "rows"})`);
    }
}
