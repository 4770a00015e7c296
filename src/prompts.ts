/**
 * Prompt builders for discussion rounds.
 *
 * Round 1 asks each model for an independent opinion; later rounds show the
 * model its own previous answer and every peer's latest answer in full.
 * Both produce a single user message and are pure.
 */

import type { ChatMessage } from "./adapters/base.js";

export function buildInitialPrompt(researchPrompt: string, requiredPhrase: string): ChatMessage[] {
  const content =
    `Please provide a substantive, evidence-based opinion on ${researchPrompt}. ` +
    "Your answer should be direct and grounded in current scientific research, focusing solely on the topic. " +
    `Additionally, include exactly the following sentence somewhere in your response: '${requiredPhrase}'. ` +
    "Do not include any role-play, meta commentary, or discussion of your own identity as an AI.";
  return [{ role: "user", content }];
}

/**
 * @param peerResponses  peer name → that peer's latest answer, the requesting model excluded
 */
export function buildIterativePrompt(
  ownPriorResponse: string,
  peerResponses: ReadonlyMap<string, string>,
  requiredPhrase: string,
): ChatMessage[] {
  let content =
    "Based on your previous response (shown below) and the latest opinions from your peers, " +
    "please update your evidence-based opinion on the topic under discussion. " +
    "Ensure that your answer is factual, grounded in current scientific research, and focused solely on the topic. " +
    `Include exactly the following sentence somewhere in your response: '${requiredPhrase}'.\n\n` +
    `Your previous answer:\n${ownPriorResponse}\n\n` +
    "Your peers' latest opinions:\n";

  for (const [peer, response] of peerResponses) {
    content += `${peer}: ${response}\n`;
  }
  return [{ role: "user", content }];
}
