/**
 * format-results.ts - Plain-text renderings of agent results
 *
 * The MCP tools and the CLI both show results as text rather than JSON:
 * search hits as a numbered list with a similarity label, knowledge stats
 * as a category histogram, and the context an answer was grounded on as a
 * short source list.
 */

import type { ContextItem } from "../knowledge";
import { isUserContext } from "../knowledge";
import type { DocumentMetadata, SearchResult } from "../vectorstore";

/**
 * Formats search results as a numbered list.
 *
 * Example output:
 *   Found 2 results in "healthcare_knowledge" collection:
 *
 *   1. symptom-fever (distance: 0.18, very similar)
 *      A fever is a body temperature above 38 degrees Celsius...
 *      Metadata: category=symptoms, source=sample
 */
export function formatSearchResults(
  results: SearchResult[],
  collection: string
): string {
  if (results.length === 0) {
    return `No results found in "${collection}" collection.`;
  }

  const header = `Found ${results.length} result${results.length === 1 ? "" : "s"} in "${collection}" collection:\n`;

  const formatted = results.map((result, index) => {
    const lines = [
      `${index + 1}. ${result.id} (distance: ${result.distance.toFixed(2)}, ${describeSimilarity(result.distance)})`,
      `   ${result.text}`,
    ];
    const metadataLine = formatMetadata(result.metadata);
    if (metadataLine) {
      lines.push(`   Metadata: ${metadataLine}`);
    }
    return lines.join("\n");
  });

  return header + "\n" + formatted.join("\n\n");
}

/**
 * Cosine distance to a label: 0 is identical, 1 unrelated, 2 opposite.
 */
export function describeSimilarity(distance: number): string {
  if (distance < 0.3) return "very similar";
  if (distance < 0.6) return "similar";
  if (distance < 1.0) return "somewhat related";
  return "weak match";
}

function formatMetadata(metadata: DocumentMetadata): string {
  return Object.entries(metadata)
    .map(([key, value]) => `${key}=${value}`)
    .join(", ");
}

export interface KnowledgeStatsView {
  totalDocuments: number;
  categoryCounts: Record<string, number>;
  collectionName: string;
}

/**
 * Example output:
 *   Knowledge base "healthcare_knowledge": 13 documents
 *     diseases: 3
 *     medications: 3
 */
export function formatStats(stats: KnowledgeStatsView): string {
  const header = `Knowledge base "${stats.collectionName}": ${stats.totalDocuments} document${stats.totalDocuments === 1 ? "" : "s"}`;
  const rows = Object.keys(stats.categoryCounts)
    .sort()
    .map((category) => `  ${category}: ${stats.categoryCounts[category]}`);
  return [header, ...rows].join("\n");
}

/**
 * One line per context item the answer used; empty when there was none.
 */
export function formatContextSources(context: ContextItem[]): string {
  if (context.length === 0) {
    return "";
  }
  const lines = context.map((item, index) => {
    if (isUserContext(item)) {
      return `${index + 1}. user context`;
    }
    const category = item.metadata.category;
    const label = category === undefined ? "" : ` [${category}]`;
    return `${index + 1}. ${item.id}${label} (distance: ${item.distance.toFixed(2)})`;
  });
  return [`Sources (${context.length}):`, ...lines].join("\n");
}
