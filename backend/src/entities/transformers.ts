import { ValueTransformer } from "typeorm";

/**
 * Postgres hands decimal columns back as strings; SQLite as numbers.
 * Normalises both to a JS number.
 */
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => {
    if (value === null || value === undefined) return value;
    return typeof value === "number" ? value : parseFloat(value);
  }
};
