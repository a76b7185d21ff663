/**
 * Confidence routing
 *
 * | Confidence          | Bucket | Paths                                   |
 * |---------------------|--------|-----------------------------------------|
 * | > high threshold    | high   | database (documents if no sub-intent)   |
 * | [low, high]         | medium | database + documents, merged            |
 * | < low threshold     | low    | documents only                          |
 */

import type { ConfidenceBucket, ExecutionPath, QueryIntent, RoutePlan } from '../common/types.js';
import { HIGH_CONFIDENCE_THRESHOLD, LOW_CONFIDENCE_THRESHOLD } from '../common/constants.js';

export interface RoutingThresholds {
  high: number;
  low: number;
}

export const DEFAULT_ROUTING_THRESHOLDS: RoutingThresholds = {
  high: HIGH_CONFIDENCE_THRESHOLD,
  low: LOW_CONFIDENCE_THRESHOLD,
};

export function confidenceBucket(
  confidence: number,
  thresholds: RoutingThresholds = DEFAULT_ROUTING_THRESHOLDS
): ConfidenceBucket {
  if (confidence > thresholds.high) return 'high';
  if (confidence < thresholds.low) return 'low';
  return 'medium';
}

export function planRoute(
  intent: QueryIntent,
  thresholds: RoutingThresholds = DEFAULT_ROUTING_THRESHOLDS
): RoutePlan {
  const bucket = confidenceBucket(intent.confidence, thresholds);
  const hasSubIntents = intent.databaseQueries.length > 0;

  switch (bucket) {
    case 'high':
      return hasSubIntents
        ? { bucket, runDatabase: true, runDocuments: false, reason: 'High confidence database match' }
        : { bucket, runDatabase: false, runDocuments: true, reason: 'High confidence but no database selected' };

    case 'medium':
      return {
        bucket,
        runDatabase: hasSubIntents,
        runDocuments: true,
        reason: hasSubIntents ? 'Medium confidence; combining databases and documents' : 'Medium confidence; no database selected',
      };

    case 'low':
      return { bucket, runDatabase: false, runDocuments: true, reason: 'Low confidence; documents only' };
  }
}

/**
 * The path a plan actually executes
 */
export function executionPath(plan: Pick<RoutePlan, 'runDatabase' | 'runDocuments'>): ExecutionPath {
  if (plan.runDatabase && plan.runDocuments) return 'hybrid';
  if (plan.runDatabase) return 'database';
  if (plan.runDocuments) return 'document';
  return 'none';
}
