import { ValidationError } from "./Errors";
import { matches, type ColumnName, type DataType, type Value } from "./Types";

export interface Column {
    readonly name: ColumnName;
    readonly type: DataType;
}

export function column(name: ColumnName, type: DataType): Column {
    return { name, type };
}

export class Schema {
    private readonly indexByName: Map<string, number>;

    private constructor(public readonly columns: readonly Column[], indexByName: Map<string, number>) {
        this.indexByName = indexByName;
    }

    static create(columns: readonly Column[]): Schema {
        const indexByName = new Map<string, number>();
        columns.forEach((col, i) => {
            if (indexByName.has(col.name.value)) {
                throw new ValidationError(`Duplicate column name: ${col.name.value}`);
            }
            indexByName.set(col.name.value, i);
        });
        return new Schema([...columns], indexByName);
    }

    indexOf(name: ColumnName | string): number | undefined {
        return this.indexByName.get(typeof name === "string" ? name : name.value);
    }

    // The one place row conformance is decided; Row and Table both go through here.
    validate(values: readonly Value[]): void {
        if (values.length !== this.columns.length) {
            throw new ValidationError(
                `Row has ${values.length} values but schema has ${this.columns.length} columns`
            );
        }
        for (let i = 0; i < values.length; i++) {
            const col = this.columns[i];
            const value = values[i];
            if (col === undefined || value === undefined) continue;
            if (!matches(col.type, value)) {
                throw new ValidationError(
                    `Type mismatch at column ${i}: expected ${col.type}, got ${value.type}`
                );
            }
        }
    }
}
