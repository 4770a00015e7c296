import { describe, it, expect } from "vitest";
import { CONVERGENCE_PHRASE, extractConvergence, checkConvergence } from "../consensus/convergence.js";

function agree(pct: string): string {
  return `I am in agreement with ${pct}% of the overall opinions given by my peers.`;
}

describe("extractConvergence", () => {
  it("parses an integer percentage", () => {
    expect(extractConvergence(`Immunotherapy looks promising.\n${agree("75")}`)).toBe(75);
  });

  it("parses a decimal percentage", () => {
    expect(extractConvergence(agree("87.5"))).toBe(87.5);
  });

  it("finds the sentence in the middle of the text", () => {
    expect(extractConvergence(`First point. ${agree("40")} Second point.`)).toBe(40);
  });

  it("uses the first occurrence only", () => {
    expect(extractConvergence(`${agree("20")}\n${agree("90")}`)).toBe(20);
  });

  it("returns 0 when the sentence is missing", () => {
    expect(extractConvergence("I broadly agree with my peers.")).toBe(0);
  });

  it("returns 0 for empty text", () => {
    expect(extractConvergence("")).toBe(0);
  });

  it("is case-sensitive", () => {
    expect(extractConvergence("i am in agreement with 80% of the overall opinions given by my peers.")).toBe(0);
  });

  it("requires the trailing period", () => {
    expect(extractConvergence("I am in agreement with 80% of the overall opinions given by my peers")).toBe(0);
  });

  it("rejects different wording", () => {
    expect(extractConvergence("I am in agreement with 80% of the opinions given by my peers.")).toBe(0);
  });

  it("returns 0 for the unfilled template", () => {
    expect(extractConvergence(CONVERGENCE_PHRASE)).toBe(0);
  });
});

describe("checkConvergence", () => {
  it("returns not converged with average 0 for an empty map", () => {
    expect(checkConvergence(new Map(), 90)).toEqual({ converged: false, average: 0 });
  });

  it("averages extracted values without weighting", () => {
    const responses = new Map([
      ["gpt", agree("50")],
      ["claude", agree("100")],
    ]);
    expect(checkConvergence(responses, 90)).toEqual({ converged: false, average: 75 });
  });

  it("is inclusive at the threshold", () => {
    const responses = new Map([
      ["gpt", agree("80")],
      ["claude", agree("100")],
    ]);
    expect(checkConvergence(responses, 90)).toEqual({ converged: true, average: 90 });
  });

  it("does not converge just below the threshold", () => {
    const responses = new Map([
      ["gpt", agree("89")],
      ["claude", agree("90")],
    ]);
    expect(checkConvergence(responses, 90)).toEqual({ converged: false, average: 89.5 });
  });

  it("counts a missing sentence as 0 and lets others offset it", () => {
    const responses = new Map([
      ["a", "no phrase here"],
      ["b", agree("100")],
      ["c", agree("100")],
      ["d", agree("100")],
    ]);
    const result = checkConvergence(responses, 75);
    expect(result.average).toBe(75);
    expect(result.converged).toBe(true);
  });
});
