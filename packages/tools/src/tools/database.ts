import { z } from "zod";
import { defineTool } from "../tool.js";

export const DatabaseArgsSchema = z.object({
  recordId: z.string().trim().min(1),
  table: z.string().trim().min(1),
});

const RECORDS: Readonly<Record<string, Readonly<Record<string, Readonly<Record<string, string>>>>>> = {
  employees: {
    "EMP-001": {
      Name: "Dana Whitfield",
      Department: "Platform Engineering",
      Role: "Staff Engineer",
      StartDate: "2020-09-01",
    },
  },
  orders: {
    "ORD-555": {
      Product: "Sensor Hub S2 (x12)",
      Total: "$1,788.00",
      Status: "Shipped",
      Date: "2025-11-18",
    },
  },
};

export type DatabaseLookupResult =
  | { readonly recordId: string; readonly table: string; readonly data: Readonly<Record<string, string>> }
  | { readonly recordId: string; readonly table: string; readonly error: string; readonly suggestion: string };

/** Simulated lookup; tables match case-insensitively, ids are upper-cased. */
export function lookupRecord(table: string, recordId: string): DatabaseLookupResult {
  const data = RECORDS[table.toLowerCase()]?.[recordId.toUpperCase()];
  if (!data) {
    return {
      recordId,
      table,
      error: `Record '${recordId}' not found in table '${table}'`,
      suggestion: "Check the record ID and table name",
    };
  }
  return { recordId, table, data };
}

export const databaseTool = defineTool({
  name: "get_database_record",
  description: "Retrieve a record from the database by ID.",
  parameters: {
    type: "object",
    properties: {
      recordId: { type: "string", description: "The record ID to look up" },
      table: { type: "string", description: "The database table name" },
    },
    required: ["recordId", "table"],
  },
  schema: DatabaseArgsSchema,
  execute: ({ recordId, table }) => lookupRecord(table, recordId),
});
