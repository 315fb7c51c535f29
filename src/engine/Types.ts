import { INT_MAX, INT_MIN } from "./Constants";
import { ValidationError } from "./Errors";

export type DataType = "Int" | "Text";

export const DATA_TYPES: readonly DataType[] = ["Int", "Text"];

export type Value =
    | { type: "Int"; value: bigint }
    | { type: "Text"; value: string };

export const Value = {
    // Int is a signed 64-bit integer; numbers must be exact to convert.
    int(value: bigint | number): Value {
        if (typeof value === "number" && !Number.isSafeInteger(value)) {
            throw new ValidationError(`Int value must be a safe integer: ${value}`);
        }
        const n = BigInt(value);
        if (n < INT_MIN || n > INT_MAX) throw new ValidationError(`Integer out of range: ${n}`);
        return { type: "Int", value: n };
    },
    text(value: string): Value {
        return { type: "Text", value };
    },
};

export function assertNever(value: never): never {
    throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

export function isDataType(word: string): word is DataType {
    return (DATA_TYPES as readonly string[]).includes(word);
}

// Int matches Int, Text matches Text, nothing else.
export function matches(type: DataType, value: Value): boolean {
    switch (type) {
        case "Int": return value.type === "Int";
        case "Text": return value.type === "Text";
        default: return assertNever(type);
    }
}

export function formatValue(value: Value): string {
    switch (value.type) {
        case "Int": return value.value.toString();
        case "Text": return value.value;
        default: return assertNever(value);
    }
}

function validateName(kind: "Table" | "Column", name: string): void {
    const first = name.charAt(0);
    if (first === "") throw new ValidationError(`${kind} name cannot be empty`);
    if (!/^[A-Za-z]$/.test(first)) throw new ValidationError(`${kind} name must start with a letter`);

    for (const c of name.slice(1)) {
        if (/^[A-Za-z0-9_]$/.test(c)) continue;
        if (c === " ") throw new ValidationError(`${kind} name cannot contain spaces`);
        throw new ValidationError(`${kind} name can only contain ASCII letters, digits, or underscores`);
    }
}

export class TableName {
    private constructor(private readonly name: string) { }

    static create(name: string): TableName {
        validateName("Table", name);
        return new TableName(name);
    }

    get value(): string {
        return this.name;
    }

    equals(other: TableName): boolean {
        return this.name === other.name;
    }

    toString(): string {
        return this.name;
    }
}

export class ColumnName {
    private constructor(private readonly name: string) { }

    static create(name: string): ColumnName {
        validateName("Column", name);
        return new ColumnName(name);
    }

    get value(): string {
        return this.name;
    }

    equals(other: ColumnName): boolean {
        return this.name === other.name;
    }

    toString(): string {
        return this.name;
    }
}
