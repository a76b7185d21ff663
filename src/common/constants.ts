/**
 * Calibration constants
 *
 * These thresholds were tuned by hand against real traffic and have no
 * derivation beyond that. Every one of them can be overridden through
 * FederationConfig (see pipeline/config.ts) and should be re-tuned
 * empirically when the query mix changes.
 */

// =============================================================================
// ROUTING
// =============================================================================

/** Confidence strictly above this routes to the high bucket */
export const HIGH_CONFIDENCE_THRESHOLD = 0.7;

/** Confidence strictly below this routes to the low bucket */
export const LOW_CONFIDENCE_THRESHOLD = 0.3;

/** Confidence assigned to a vocabulary-match fallback intent */
export const FALLBACK_CONFIDENCE = 0.3;

// =============================================================================
// HEURISTIC CLASSIFIER
// =============================================================================

/** Score at which a query is treated as an information request */
export const HEURISTIC_INFORMATION_SCORE = 3;

/** Raised bar for long, punctuation-bearing queries */
export const HEURISTIC_LONG_QUERY_INFORMATION_SCORE = 4;

/** Token count from which the raised bar applies */
export const HEURISTIC_LONG_QUERY_TOKENS = 6;

/** Token count that earns the long_query signal */
export const HEURISTIC_MIN_TOKENS_SIGNAL = 5;

/** Short-query bounds for the conversation shortcut */
export const CONVERSATION_MAX_TOKENS = 2;
export const CONVERSATION_MAX_CHARS = 25;

/** Shape that overrides an AI "conversation" verdict */
export const OVERRIDE_MIN_CHARS = 40;
export const OVERRIDE_MIN_TOKENS = 6;

/** Token count the AI classifier is asked to produce */
export const AI_MIN_TOKENS = 8;
export const AI_MAX_TOKENS = 12;

/** Conversation history kept for the AI classifier (characters) */
export const MAX_HISTORY_CHARS = 400;

// =============================================================================
// ANALYZER & SYNTHESIS
// =============================================================================

/** Tables per database shown in the analysis prompt */
export const ANALYSIS_MAX_TABLES = 15;

/** Columns per table shown in the analysis prompt */
export const ANALYSIS_MAX_COLUMNS = 6;

/** Tables per database in a vocabulary fallback intent */
export const FALLBACK_MAX_TABLES = 5;

/** Sample rows per table embedded in the SQL prompt */
export const PROMPT_SAMPLE_ROWS = 3;

/** Structural ceiling for synthesized SQL */
export const MAX_JOINS = 2;
export const MAX_WHERE_PREDICATES = 2;
export const MAX_SELECT_LEVELS = 2;

// =============================================================================
// EXECUTION & MERGE
// =============================================================================

export const DEFAULT_MAX_ROWS = 100;
export const DEFAULT_QUERY_TIMEOUT_MS = 30000;
export const DEFAULT_MAX_DOCUMENT_RESULTS = 5;

/** Length of the SQL shown in a source excerpt */
export const SOURCE_SQL_PREVIEW_CHARS = 160;

/** Length of a document excerpt in a source entry */
export const DOCUMENT_EXCERPT_CHARS = 200;

/** Rows per table rendered into the answer context */
export const CONTEXT_MAX_ROWS = 50;

export const NO_DATA_ANSWER =
  "I couldn't find any data that answers this question in the connected databases or documents.";

export const DOCUMENT_ONLY_NOTE =
  'Note: no database returned data for this question; the answer is based on documents only.';
