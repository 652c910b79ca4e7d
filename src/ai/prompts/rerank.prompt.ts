export interface RerankPromptEntry {
  index: number;
  title: string;
  author: string;
  publishedDate: string;
  score: number;
  excerpt: string;
}

export function buildRerankPrompt(profileSummary: string, entries: RerankPromptEntry[], count: number): string {
  const lines = entries.map((entry) =>
    [
      `${entry.index}. ${entry.title}`,
      `   author: ${entry.author || "unknown"}`,
      `   published: ${entry.publishedDate || "unknown"}`,
      `   similarity: ${entry.score.toFixed(3)}`,
      `   excerpt: ${entry.excerpt}`,
    ].join("\n"),
  );

  return [
    "Task: choose the articles this candidate is most likely to find valuable.",
    "Return STRICT JSON only.",
    "",
    "Output schema:",
    "{",
    '  "indices": [1, 2, 3]',
    "}",
    "",
    "Rules:",
    `- Pick exactly ${count} distinct indices from the numbered list.`,
    "- Order them best first.",
    "- Prefer specific, substantive articles over generic company or culture posts.",
    "- Prefer variety of topics over near-duplicates.",
    "",
    `Candidate:\n${profileSummary}`,
    "",
    `Articles:\n${lines.join("\n")}`,
  ].join("\n");
}
