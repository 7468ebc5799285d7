/**
 * format-results.test.ts - Unit tests for the text formatters
 */

import { describe, it, expect } from "vitest";
import {
  describeSimilarity,
  formatContextSources,
  formatSearchResults,
  formatStats,
} from "./format-results";

describe("formatSearchResults", () => {
  it("numbers results with distance, label and metadata", () => {
    const text = formatSearchResults(
      [
        { id: "flu", text: "Flu causes fever", metadata: { category: "symptoms" }, distance: 0.12 },
        { id: "walk", text: "Walk daily", metadata: {}, distance: 0.75 },
      ],
      "healthcare_knowledge"
    );

    expect(text).toBe(
      [
        'Found 2 results in "healthcare_knowledge" collection:',
        "",
        "1. flu (distance: 0.12, very similar)",
        "   Flu causes fever",
        "   Metadata: category=symptoms",
        "",
        "2. walk (distance: 0.75, somewhat related)",
        "   Walk daily",
      ].join("\n")
    );
  });

  it("says so when nothing matched", () => {
    expect(formatSearchResults([], "healthcare_knowledge")).toBe(
      'No results found in "healthcare_knowledge" collection.'
    );
  });
});

describe("describeSimilarity", () => {
  it("labels distance bands", () => {
    expect([0, 0.3, 0.6, 1.2].map(describeSimilarity)).toEqual([
      "very similar",
      "similar",
      "somewhat related",
      "weak match",
    ]);
  });
});

describe("formatStats", () => {
  it("lists categories alphabetically", () => {
    expect(
      formatStats({
        totalDocuments: 3,
        categoryCounts: { symptoms: 1, diseases: 2 },
        collectionName: "healthcare_knowledge",
      })
    ).toBe('Knowledge base "healthcare_knowledge": 3 documents\n  diseases: 2\n  symptoms: 1');
  });

  it("uses the singular for one document", () => {
    expect(
      formatStats({ totalDocuments: 1, categoryCounts: { uncategorized: 1 }, collectionName: "kb" })
    ).toBe('Knowledge base "kb": 1 document\n  uncategorized: 1');
  });
});

describe("formatContextSources", () => {
  it("labels ad-hoc context and shows categories of retrieved documents", () => {
    expect(
      formatContextSources([
        { id: "user_context", text: "I am pregnant", metadata: { source: "user_context" } },
        { id: "ibu", text: "Ibuprofen", metadata: { category: "medications" }, distance: 0.2 },
        { id: "misc", text: "Other", metadata: {}, distance: 0.5 },
      ])
    ).toBe(
      [
        "Sources (3):",
        "1. user context",
        "2. ibu [medications] (distance: 0.20)",
        "3. misc (distance: 0.50)",
      ].join("\n")
    );
  });

  it("is empty without context", () => {
    expect(formatContextSources([])).toBe("");
  });
});
