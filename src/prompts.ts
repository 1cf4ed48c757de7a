import { RANKING_HEADER } from './ranking.js';
import type { AdvisorResponse, LabelMap, RankingEntry } from './types.js';

export function buildRankingPrompt(
  question: string,
  responses: ReadonlyArray<{ label: string; text: string }>,
): string {
  const block = responses.map((r) => `${r.label}:\n${r.text}`).join('\n\n');
  // Reverse order so the example does not read as "keep them as given"
  const example = responses
    .slice(0, 3)
    .map((r) => r.label)
    .reverse()
    .map((label, i) => `${i + 1}. ${label}`)
    .join('\n');

  return `You are reviewing several answers to the same question. The authors are hidden.

Question: ${question}

Answers:

${block}

Your task:
1. Assess each answer on its own: what it gets right, what it gets wrong or leaves out.
2. Finish with your ranking of ALL answers, best first.

The ranking MUST use this exact format and come last:
- A line reading "${RANKING_HEADER}" (capitals, with the colon)
- Then one numbered line per answer: number, period, space, the answer label and nothing else
- No commentary inside or after the ranking

Example:

${RANKING_HEADER}
${example}

Begin your review:`;
}

export function buildChairmanPrompt(
  question: string,
  stage1: readonly AdvisorResponse[],
  stage2: readonly RankingEntry[],
  labelMap: LabelMap,
): string {
  const answers = stage1
    .filter((r) => r.response.length > 0)
    .map((r) => `Advisor: ${r.advisor} (${r.model})\nAnswer: ${r.response}`)
    .join('\n\n');

  const labels = Object.entries(labelMap)
    .map(([label, p]) => `${label} = ${p.advisor}`)
    .join('\n');

  const reviews = stage2
    .filter((r) => r.ranking.length > 0)
    .map((r) => `Reviewer: ${r.advisor}\nReview: ${r.ranking}`)
    .join('\n\n');

  return `You chair a council of advisors. Each advisor answered the user's question independently, then reviewed and ranked the others' answers without knowing who wrote them.

Original question: ${question}

STAGE 1: Answers
${answers}

STAGE 2: Peer reviews (labels refer to:
${labels}
)
${reviews}

Write the single best answer to the original question. Draw on:
- the strongest points of each answer
- what the reviews say about quality and accuracy
- where the advisors agree, and where they disagree and why

Answer the user directly. Do not describe the council, the stages or your role.`;
}

export function buildTitlePrompt(question: string): string {
  return `Write a title of at most five words for a conversation that starts with the question below. No quotes, no trailing punctuation. Reply with the title only.

Question: ${question}

Title:`;
}
