import { Logger } from "../config/logger";
import { DocumentRef, Match } from "../shared/types/matching.types";

export interface DocumentLookup {
  findByReferences(references: ReadonlyArray<string>): Promise<DocumentRef[]>;
}

export interface PinnedDocumentOptions {
  pool?: ReadonlyArray<Match>;
  lookup?: DocumentLookup;
  logger?: Logger;
}

/**
 * Puts pinned documents ahead of the ranked selection.
 *
 * References are document ids or URLs. Scores come from the retrieval pool when the
 * document was retrieved, otherwise they are 0. References that neither the pool nor
 * the lookup can resolve are skipped.
 */
export async function applyPinnedDocuments(
  selection: ReadonlyArray<Match>,
  pinned: ReadonlyArray<string>,
  finalCount: number,
  options: PinnedDocumentOptions = {},
): Promise<Match[]> {
  const references = Array.from(new Set(pinned.map((item) => item.trim()).filter((item) => item.length > 0)));
  if (!references.length) {
    return selection.slice(0, finalCount);
  }

  const known = [...(options.pool ?? []), ...selection];
  const resolved = new Map<string, Match>();
  const unresolved: string[] = [];
  for (const reference of references) {
    const match = known.find((item) => matchesReference(item.document, reference));
    if (match) {
      resolved.set(reference, { ...match, sourceField: "pinned" });
    } else {
      unresolved.push(reference);
    }
  }

  if (unresolved.length && options.lookup) {
    try {
      const documents = await options.lookup.findByReferences(unresolved);
      for (const reference of unresolved) {
        const document = documents.find((item) => matchesReference(item, reference));
        if (document) {
          resolved.set(reference, { document, score: 0, snippet: "", sourceField: "pinned" });
        }
      }
    } catch (error) {
      options.logger?.warn("Pinned document lookup failed", {
        references: unresolved,
        error: error instanceof Error ? error.message : "Unknown error",
      });
    }
  }

  const pinnedMatches: Match[] = [];
  const pinnedIds = new Set<string>();
  for (const reference of references) {
    const match = resolved.get(reference);
    if (!match) {
      options.logger?.warn("Pinned document not found, skipping", { reference });
      continue;
    }
    if (pinnedIds.has(match.document.id)) {
      continue;
    }
    pinnedIds.add(match.document.id);
    pinnedMatches.push(match);
  }

  const rest = selection.filter((item) => !pinnedIds.has(item.document.id));
  return [...pinnedMatches, ...rest].slice(0, Math.max(finalCount, pinnedMatches.length));
}

function matchesReference(document: DocumentRef, reference: string): boolean {
  return document.id === reference || document.url === reference;
}
