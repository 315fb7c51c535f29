import { readFile, writeFile } from "node:fs/promises";
import { z } from "zod";
import { SNAPSHOT_VERSION } from "./Constants";
import { StorageError, errorMessage } from "./Errors";
import { column, Schema } from "./Schema";
import { Table } from "./Table";
import { assertNever, ColumnName, TableName, Value } from "./Types";

// Ints travel as decimal strings: JSON numbers cannot hold every i64.
const ValueSnapshotSchema = z.discriminatedUnion("type", [
    z.object({ type: z.literal("Int"), value: z.string().regex(/^-?\d+$/) }),
    z.object({ type: z.literal("Text"), value: z.string() }),
]);

const ColumnSnapshotSchema = z.object({
    name: z.string(),
    type: z.enum(["Int", "Text"]),
});

export const TableSnapshotSchema = z.object({
    version: z.literal(SNAPSHOT_VERSION),
    name: z.string(),
    columns: z.array(ColumnSnapshotSchema),
    rows: z.array(z.array(ValueSnapshotSchema)),
});

export type ValueSnapshot = z.infer<typeof ValueSnapshotSchema>;
export type TableSnapshot = z.infer<typeof TableSnapshotSchema>;

function encodeValue(value: Value): ValueSnapshot {
    switch (value.type) {
        case "Int": return { type: "Int", value: value.value.toString() };
        case "Text": return { type: "Text", value: value.value };
        default: return assertNever(value);
    }
}

function decodeValue(snapshot: ValueSnapshot): Value {
    switch (snapshot.type) {
        case "Int": return Value.int(BigInt(snapshot.value));
        case "Text": return Value.text(snapshot.value);
        default: return assertNever(snapshot);
    }
}

export function serializeTable(table: Table): TableSnapshot {
    return {
        version: SNAPSHOT_VERSION,
        name: table.name.value,
        columns: table.schema.columns.map(col => ({ name: col.name.value, type: col.type })),
        rows: table.rows.map(row => row.values.map(encodeValue)),
    };
}

/** Rebuilds a table through the same constructors a fresh one goes through. */
export function deserializeTable(snapshot: TableSnapshot): Table {
    const schema = Schema.create(
        snapshot.columns.map(col => column(ColumnName.create(col.name), col.type))
    );
    const table = Table.create(TableName.create(snapshot.name), schema);
    for (const values of snapshot.rows) {
        table.insertValues(values.map(decodeValue));
    }
    return table;
}

export function parseSnapshot(json: string, source = "snapshot"): TableSnapshot {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (e) {
        throw new StorageError(`Invalid JSON in ${source}: ${errorMessage(e)}`);
    }
    const result = TableSnapshotSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
        throw new StorageError(`Invalid table snapshot in ${source}${where}: ${issue?.message ?? "unknown issue"}`);
    }
    return result.data;
}

export async function saveTable(table: Table, path: string): Promise<void> {
    try {
        await writeFile(path, JSON.stringify(serializeTable(table), null, 2));
    } catch (e) {
        throw new StorageError(`Cannot write ${path}: ${errorMessage(e)}`);
    }
}

export async function loadTable(path: string): Promise<Table> {
    let content: string;
    try {
        content = await readFile(path, "utf-8");
    } catch (e) {
        throw new StorageError(`Cannot read ${path}: ${errorMessage(e)}`);
    }
    return deserializeTable(parseSnapshot(content, path));
}
