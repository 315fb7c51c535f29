import { afterEach, describe, test, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "path";
import { Catalog } from "../src/engine/Catalog";
import { Database } from "../src/engine/Database";
import { resolveConfig } from "../src/repl/Config";
import { Session } from "../src/repl/Session";

describe("Session", () => {
    test("blank lines and exit commands", async () => {
        const session = new Session(new Database());
        expect(await session.handle("   ")).toEqual({ type: 'skip' });
        expect(await session.handle("exit")).toEqual({ type: 'exit' });
        expect(await session.handle("  QUIT ")).toEqual({ type: 'exit' });
    });

    test("prints OK, rows and counts", async () => {
        const session = new Session(new Database());
        expect(await session.handle("CREATE TABLE users (id Int, name Text);")).toEqual({ type: 'output', lines: ["OK"] });
        await session.handle("INSERT INTO users VALUES (1, 'Alice');");
        await session.handle("INSERT INTO users VALUES (2, 'Bob');");

        expect(await session.handle("SELECT * FROM users;")).toEqual({
            type: 'output',
            lines: ["id | name", "1 | Alice", "2 | Bob", "(2 rows)"],
        });
        expect(await session.handle("SELECT name FROM users")).toEqual({
            type: 'output',
            lines: ["name", "Alice", "Bob", "(2 rows)"],
        });
    });

    test("singular row count", async () => {
        const session = new Session(new Database());
        await session.handle("CREATE TABLE t (a Int)");
        await session.handle("INSERT INTO t VALUES (7)");
        expect(await session.handle("SELECT a FROM t")).toEqual({ type: 'output', lines: ["a", "7", "(1 row)"] });
    });

    test("errors are reported and the session goes on", async () => {
        const session = new Session(new Database());
        expect(await session.handle("SELECT * FROM users")).toEqual({ type: 'error', message: "unknown table: users" });
        expect(await session.handle("SELECT # FROM users")).toEqual({
            type: 'error',
            message: "Unexpected character '#' at position 7",
        });
        expect(await session.handle("CREATE TABLE users (id Int)")).toEqual({ type: 'output', lines: ["OK"] });
    });

    test(".tables lists tables with row counts", async () => {
        const session = new Session(new Database());
        expect(await session.handle(".tables")).toEqual({ type: 'output', lines: ["(no tables)"] });
        await session.handle("CREATE TABLE a (x Int)");
        await session.handle("CREATE TABLE b (y Text)");
        await session.handle("INSERT INTO b VALUES ('hi')");
        expect(await session.handle(".tables")).toEqual({ type: 'output', lines: ["a (0 rows)", "b (1 row)"] });
    });
});

describe("Session with a catalog", () => {
    let dir: string | undefined;

    afterEach(async () => {
        if (dir) await rm(dir, { recursive: true, force: true });
        dir = undefined;
    });

    test("writes through CREATE and INSERT, not failed statements", async () => {
        dir = await mkdtemp(join(tmpdir(), "tabula-repl-"));
        const catalog = new Catalog(dir);
        const session = new Session(new Database(), catalog);

        await session.handle("CREATE TABLE users (id Int, name Text)");
        await session.handle("INSERT INTO users VALUES (1, 'Alice')");
        await session.handle("INSERT INTO users VALUES ('bad', 'row')");

        const reloaded = await catalog.load();
        expect(reloaded.tableNames()).toEqual(["users"]);
        expect(reloaded.require("users").rowCount).toBe(1);
    });

    test("a failed write keeps the statement and reports it as unsaved", async () => {
        dir = await mkdtemp(join(tmpdir(), "tabula-repl-"));
        const blocker = join(dir, "not-a-dir");
        await writeFile(blocker, "");
        const session = new Session(new Database(), new Catalog(join(blocker, "db")));

        const created = await session.handle("CREATE TABLE t (a Int)");
        expect(created.type).toBe('unsaved');
        if (created.type === 'unsaved') {
            expect(created.lines).toEqual(["OK"]);
            expect(created.message.startsWith(`Cannot create ${join(blocker, "db")}:`)).toBe(true);
        }

        expect(await session.handle("SELECT * FROM t")).toEqual({ type: 'output', lines: ["a", "(0 rows)"] });
        expect(await session.handle("INSERT INTO t VALUES ('x')")).toEqual({
            type: 'error',
            message: "Type mismatch at column 0: expected Int, got Text",
        });
    });
});

describe("resolveConfig", () => {
    test("defaults", () => {
        expect(resolveConfig({})).toEqual({ dataDir: "data", persist: true });
    });

    test("environment overrides", () => {
        expect(resolveConfig({ TABULA_DATA_DIR: "/tmp/db", TABULA_PERSIST: "0" }))
            .toEqual({ dataDir: "/tmp/db", persist: false });
        expect(resolveConfig({ TABULA_DATA_DIR: "  " })).toEqual({ dataDir: "data", persist: true });
    });
});
