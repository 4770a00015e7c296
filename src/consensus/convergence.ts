/**
 * Convergence signal: the one structured value read from free-text answers.
 *
 * Every model is asked to include CONVERGENCE_PHRASE with a number in place of
 * {percentage}. The first exact, case-sensitive occurrence is parsed; anything
 * else counts as 0.
 */

export const PERCENTAGE_PLACEHOLDER = "{percentage}";

export const CONVERGENCE_PHRASE =
  `I am in agreement with ${PERCENTAGE_PLACEHOLDER}% of the overall opinions given by my peers.`;

const CONVERGENCE_PATTERN =
  /I am in agreement with (\d+(?:\.\d+)?)% of the overall opinions given by my peers\./;

/** Agreement percentage stated in `text`, or 0 when the sentence is missing or malformed. */
export function extractConvergence(text: string): number {
  const match = CONVERGENCE_PATTERN.exec(text);
  return match ? parseFloat(match[1]) : 0;
}

export interface ConvergenceCheck {
  converged: boolean;
  /** Unweighted mean of every model's extracted agreement */
  average: number;
}

/**
 * Average the agreement reported in each model's latest response.
 * Converged when the mean reaches the threshold (inclusive). An empty map never converges.
 */
export function checkConvergence(latestResponses: ReadonlyMap<string, string>, threshold: number): ConvergenceCheck {
  if (latestResponses.size === 0) {
    return { converged: false, average: 0 };
  }

  let total = 0;
  for (const response of latestResponses.values()) {
    total += extractConvergence(response);
  }
  const average = total / latestResponses.size;
  return { converged: average >= threshold, average };
}
