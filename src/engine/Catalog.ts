import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "path";
import { z } from "zod";
import { CATALOG_FILE, DATA_DIR } from "./Constants";
import { Database } from "./Database";
import { StorageError, ValidationError, errorMessage } from "./Errors";
import { loadTable, saveTable } from "./Storage";
import type { Table } from "./Table";
import { TableName } from "./Types";

// Entries become file names, so they must be valid table names.
const CatalogTableSchema = z.string().transform((name, ctx) => {
    try {
        return TableName.create(name).value;
    } catch (e) {
        if (!(e instanceof ValidationError)) throw e;
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: e.message });
        return z.NEVER;
    }
});

const CatalogDataSchema = z.object({
    tables: z.array(CatalogTableSchema),
});

export type CatalogData = z.infer<typeof CatalogDataSchema>;

function isMissingFile(e: unknown): boolean {
    return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * A directory holding one `<table>.json` snapshot per table plus
 * `catalog.json`, which lists the tables in creation order.
 */
export class Catalog {
    private path: string;

    constructor(public readonly dir: string = DATA_DIR) {
        this.path = join(dir, CATALOG_FILE);
    }

    tablePath(name: string): string {
        return join(this.dir, `${name}.json`);
    }

    async read(): Promise<CatalogData> {
        let content: string;
        try {
            content = await readFile(this.path, "utf-8");
        } catch (e) {
            if (isMissingFile(e)) return { tables: [] };
            throw new StorageError(`Cannot read ${this.path}: ${errorMessage(e)}`);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (e) {
            throw new StorageError(`Invalid JSON in ${this.path}: ${errorMessage(e)}`);
        }
        const result = CatalogDataSchema.safeParse(raw);
        if (!result.success) {
            const issue = result.error.issues[0];
            const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
            throw new StorageError(`Invalid catalog in ${this.path}${where}: ${issue?.message ?? "unknown issue"}`);
        }
        return result.data;
    }

    async load(): Promise<Database> {
        const data = await this.read();
        const db = new Database();
        for (const name of data.tables) {
            const table = await loadTable(this.tablePath(name));
            if (table.name.value !== name) {
                throw new StorageError(`Snapshot ${this.tablePath(name)} holds table '${table.name.value}', expected '${name}'`);
            }
            db.attach(table);
        }
        return db;
    }

    async save(db: Database): Promise<void> {
        await this.ensureDir();
        for (const table of db.tables()) {
            await saveTable(table, this.tablePath(table.name.value));
        }
        await this.writeCatalog(db);
    }

    // Rewrites a single table's snapshot, plus the catalog in case the table is new.
    async saveTable(db: Database, table: Table): Promise<void> {
        await this.ensureDir();
        await saveTable(table, this.tablePath(table.name.value));
        await this.writeCatalog(db);
    }

    private async ensureDir(): Promise<void> {
        try {
            await mkdir(this.dir, { recursive: true });
        } catch (e) {
            throw new StorageError(`Cannot create ${this.dir}: ${errorMessage(e)}`);
        }
    }

    private async writeCatalog(db: Database): Promise<void> {
        const data: CatalogData = { tables: db.tableNames() };
        try {
            await writeFile(this.path, JSON.stringify(data, null, 2));
        } catch (e) {
            throw new StorageError(`Cannot write ${this.path}: ${errorMessage(e)}`);
        }
    }
}
