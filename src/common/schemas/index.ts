/**
 * Zod schemas
 *
 * - Generative output (classification, intent analysis)
 * - Configuration files and environment
 * - MCP tool inputs
 */

import { z } from 'zod';

// =============================================================================
// GENERATIVE OUTPUT
// =============================================================================

/**
 * {type, tokens[], answer} returned by the AI classifier
 * `type` is matched case-insensitively; anything else is a mismatch.
 */
export const ClassificationResponseSchema = z.object({
  type: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.enum(['CONVERSATION', 'INFORMATION'])),
  tokens: z.array(z.string()).optional().default([]),
  answer: z.string().nullable().optional(),
});

export type ClassificationResponse = z.infer<typeof ClassificationResponseSchema>;

export const AnalyzedDatabaseSchema = z.object({
  databaseId: z.string().default(''),
  databaseName: z.string().default(''),
  requiredTables: z.array(z.string()).default([]),
  purpose: z.string().default(''),
  priority: z.number().int().default(1),
});

export const IntentAnalysisResponseSchema = z.object({
  understanding: z.string().default(''),
  confidence: z.coerce.number().default(0),
  requiresCrossDatabaseJoin: z.boolean().default(false),
  reasoning: z.string().optional(),
  databases: z.array(AnalyzedDatabaseSchema).default([]),
});

export type IntentAnalysisResponse = z.infer<typeof IntentAnalysisResponseSchema>;

// =============================================================================
// CONFIGURATION
// =============================================================================

export const SqlDialectSchema = z.enum(['sqlite', 'postgresql', 'mysql', 'sqlserver']);

export const DatabaseEntrySchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    dialect: SqlDialectSchema.default('sqlite'),
    /** SQLite file, relative to the config file */
    path: z.string().min(1).optional(),
    /** PostgreSQL connection string */
    connectionString: z.string().min(1).optional(),
    /** PostgreSQL schema to introspect (default: public) */
    schema: z.string().min(1).optional(),
    maxRows: z.number().int().positive().optional(),
    timeoutMs: z.number().int().positive().optional(),
    enabled: z.boolean().default(true),
  })
  .superRefine((entry, ctx) => {
    if (entry.dialect === 'sqlite' && !entry.path) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['path'], message: 'SQLite databases need a path' });
    }
    if (entry.dialect === 'postgresql' && !entry.connectionString) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['connectionString'],
        message: 'PostgreSQL databases need a connectionString',
      });
    }
  });

export type DatabaseEntry = z.infer<typeof DatabaseEntrySchema>;

export const FederationFileSchema = z.object({
  databases: z.array(DatabaseEntrySchema).default([]),
  /** JSON file of document chunks for keyword search */
  documents: z.string().optional(),
});

export type FederationFile = z.infer<typeof FederationFileSchema>;

export const DocumentChunkFileSchema = z.array(
  z.object({
    documentId: z.string().min(1),
    documentName: z.string().min(1),
    content: z.string(),
    chunkIndex: z.number().int().nonnegative().optional(),
  })
);

/** Environment variables; every field optional, numbers still strings here */
export const FederationEnvSchema = z.object({
  FEDERATION_HIGH_CONFIDENCE: z.string().optional(),
  FEDERATION_LOW_CONFIDENCE: z.string().optional(),
  FEDERATION_HEURISTIC_INFO_SCORE: z.string().optional(),
  FEDERATION_HEURISTIC_LONG_INFO_SCORE: z.string().optional(),
  FEDERATION_MIN_AI_TOKENS: z.string().optional(),
  FEDERATION_MAX_AI_TOKENS: z.string().optional(),
  FEDERATION_MAX_ROWS: z.string().optional(),
  FEDERATION_QUERY_TIMEOUT_MS: z.string().optional(),
  FEDERATION_MAX_DOCUMENT_RESULTS: z.string().optional(),
  FEDERATION_INTENT_CACHE: z.enum(['true', 'false']).optional(),
  CLAUDE_MODEL: z.string().optional(),
  CLAUDE_FALLBACK_MODEL: z.string().optional(),
});

// =============================================================================
// MCP TOOL INPUTS
// =============================================================================

export const FederatedQueryToolSchema = z.object({
  query: z.string().min(1).describe('Natural-language question to answer from the connected databases and documents'),
  conversation_history: z
    .string()
    .optional()
    .describe('Recent conversation text, used only to disambiguate the question'),
  max_results: z
    .number()
    .int()
    .min(1)
    .max(1000)
    .optional()
    .describe('Row budget per database (default: configured max rows)'),
});

export const ClassifyQueryToolSchema = z.object({
  query: z.string().min(1).describe('The query to classify as conversation or information'),
});

export const ListSchemasToolSchema = z.object({
  database_id: z.string().optional().describe('Limit output to one database'),
});
