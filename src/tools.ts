/**
 * MCP tool definitions (Zod schemas).
 *
 * These define the tools exposed by the Conclave MCP server:
 * - list_protocols: the catalogue with agent bounds and loop settings
 * - run_protocol:   run one protocol to completion and return its result
 * - get_run:        a stored run by id
 * - list_runs:      recent stored runs, newest first
 */

import { z } from "zod";

// --- Tool input schemas ---

export const ListProtocolsInputSchema = z.object({
  category: z
    .enum(["synthesis", "deliberation", "voting", "analysis", "estimation", "planning"])
    .optional()
    .describe("Only list protocols of this category"),
});

export const RunProtocolInputSchema = z.object({
  protocol: z.string().min(1).describe("Protocol id, e.g. 'delphi' or 'borda_count'"),
  question: z.string().min(1).describe("The question or decision the workers address"),
  workers: z
    .array(z.string())
    .optional()
    .describe("Worker keys to put on the roster (default: all enabled)"),
  options: z
    .array(z.string())
    .optional()
    .describe("Candidates, choices or initiatives for protocols that need them"),
  rounds: z
    .number()
    .int()
    .min(1)
    .max(10)
    .optional()
    .describe("Round count for looping protocols (default: the protocol's own)"),
  tools: z
    .boolean()
    .default(false)
    .describe("Forward each worker's configured tools to its endpoint"),
});

export const GetRunInputSchema = z.object({
  run_id: z.string().describe("Run id returned by run_protocol"),
  include_phases: z
    .boolean()
    .default(false)
    .describe("Include every phase result, not just the final artifact"),
});

export const ListRunsInputSchema = z.object({
  protocol: z.string().optional().describe("Only runs of this protocol"),
  limit: z.number().int().min(1).max(100).default(20).describe("Max runs to return"),
});

// --- Tool output types ---

export type ListProtocolsInput = z.infer<typeof ListProtocolsInputSchema>;
export type RunProtocolInput = z.infer<typeof RunProtocolInputSchema>;
export type GetRunInput = z.infer<typeof GetRunInputSchema>;
export type ListRunsInput = z.infer<typeof ListRunsInputSchema>;
