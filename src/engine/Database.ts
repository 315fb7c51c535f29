import { CatalogError, ExecError } from "./Errors";
import { Row } from "./Row";
import type { Schema } from "./Schema";
import { Table } from "./Table";
import type { ColumnName, TableName, Value } from "./Types";

export class Database {
    private tablesByName: Map<string, Table> = new Map();

    createTable(name: TableName, schema: Schema): Table {
        if (this.tablesByName.has(name.value)) {
            throw new CatalogError(`Table with name '${name.value}' already exists`);
        }
        const table = Table.create(name, schema);
        this.tablesByName.set(name.value, table);
        return table;
    }

    /** Adopts a table rebuilt elsewhere (e.g. from a snapshot) under its own name. */
    attach(table: Table): Table {
        if (this.tablesByName.has(table.name.value)) {
            throw new CatalogError(`Table with name '${table.name.value}' already exists`);
        }
        this.tablesByName.set(table.name.value, table);
        return table;
    }

    table(name: TableName | string): Table | undefined {
        return this.tablesByName.get(typeof name === "string" ? name : name.value);
    }

    /** Like `table`, but a missing table is an error. */
    require(name: TableName | string): Table {
        const table = this.table(name);
        if (!table) throw new ExecError(`unknown table: ${typeof name === "string" ? name : name.value}`);
        return table;
    }

    insert(name: TableName | string, values: readonly Value[] | Row): void {
        const table = this.require(name);
        if (values instanceof Row) table.insert(values);
        else table.insertValues(values);
    }

    select(name: TableName | string, columns?: readonly ColumnName[]): Row[] {
        return this.require(name).select(columns);
    }

    get tableCount(): number {
        return this.tablesByName.size;
    }

    // Map iteration order is insertion order, i.e. creation order.
    tableNames(): string[] {
        return [...this.tablesByName.keys()];
    }

    tables(): Table[] {
        return [...this.tablesByName.values()];
    }
}
