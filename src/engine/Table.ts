import { ExecError } from "./Errors";
import { Row } from "./Row";
import type { Schema } from "./Schema";
import type { ColumnName, TableName, Value } from "./Types";

export class Table {
    private readonly stored: Row[] = [];

    private constructor(public readonly name: TableName, public readonly schema: Schema) { }

    static create(name: TableName, schema: Schema): Table {
        return new Table(name, schema);
    }

    // Rows built against this exact schema were validated on construction;
    // anything else is re-checked through the same Schema.validate.
    insert(row: Row): void {
        this.stored.push(row.schema === this.schema ? row : Row.fromValues(row.values, this.schema));
    }

    insertValues(values: readonly Value[]): Row {
        const row = Row.fromValues(values, this.schema);
        this.stored.push(row);
        return row;
    }

    /**
     * Full scan in storage order. With `columns`, every name is resolved before
     * any row is built, so an unknown column yields no partial result.
     */
    select(columns?: readonly ColumnName[]): Row[] {
        if (columns === undefined) return [...this.stored];

        const indices = columns.map(col => {
            const index = this.schema.indexOf(col);
            if (index === undefined) throw new ExecError(`unknown column: ${col.value}`);
            return index;
        });
        return this.stored.map(row => row.project(indices));
    }

    get rows(): readonly Row[] {
        return this.stored;
    }

    get rowCount(): number {
        return this.stored.length;
    }
}
