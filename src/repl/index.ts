import { createInterface } from "readline";
import { Catalog } from "../engine/Catalog";
import { Database } from "../engine/Database";
import { PROMPT } from "../engine/Constants";
import { errorMessage } from "../engine/Errors";
import { resolveConfig } from "./Config";
import { Session } from "./Session";

const config = resolveConfig(process.env);
const catalog = config.persist ? new Catalog(config.dataDir) : undefined;

let db = new Database();
if (catalog) {
    try {
        db = await catalog.load();
        console.log(`Loaded ${db.tableCount} table(s) from ${catalog.dir}`);
    } catch (e) {
        console.error("Error:", errorMessage(e));
        process.exit(1);
    }
}

const session = new Session(db, catalog);

console.log("tabula SQL REPL");
console.log("Type 'exit' to quit.");

process.stdout.write(PROMPT);
const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: false });

for await (const line of rl) {
    const result = await session.handle(line);
    if (result.type === 'exit') break;

    if (result.type === 'output') {
        for (const out of result.lines) console.log(out);
    } else if (result.type === 'unsaved') {
        for (const out of result.lines) console.log(out);
        console.error("Warning: applied in memory but not saved:", result.message);
    } else if (result.type === 'error') {
        console.error("Error:", result.message);
    }
    process.stdout.write(PROMPT);
}

rl.close();
