import type { Schema } from "./Schema";
import type { Value } from "./Types";

export class Row {
    /**
     * `schema` is the schema the values were checked against, or undefined for
     * derived rows (projections) that belong to no table.
     */
    private constructor(public readonly values: readonly Value[], public readonly schema?: Schema) { }

    static fromValues(values: readonly Value[], schema: Schema): Row {
        schema.validate(values);
        return new Row([...values], schema);
    }

    /** Builds a detached row holding the values at `indices`, in that order. */
    project(indices: readonly number[]): Row {
        const values: Value[] = [];
        for (const i of indices) {
            const value = this.values[i];
            if (value === undefined) throw new RangeError(`Column index ${i} out of range`);
            values.push(value);
        }
        return new Row(values);
    }

    get(index: number): Value | undefined {
        return this.values[index];
    }
}
