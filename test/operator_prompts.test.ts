import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/core/errors.js";
import { OperatorPrompts, type InteractionPort } from "../src/interaction/prompts.js";
import type { InteractionRequest, InteractionResponse } from "../src/types/interaction.js";

/** Port that records requests and answers each with the next canned response. */
function cannedPort(...responses: InteractionResponse[]): InteractionPort & { requests: InteractionRequest[] } {
  const requests: InteractionRequest[] = [];
  return {
    requests,
    request: async (request) => {
      requests.push(request);
      const next = responses.shift();
      if (!next) throw new Error("no canned response left");
      return next;
    },
  };
}

describe("operator prompts", () => {
  it("buttons resolve to the clicked value", async () => {
    const port = cannedPort({ kind: "value", value: 1 });
    const value = await new OperatorPrompts(port).buttons([["One", 1], "Two"], { prompt: "Pick" });

    expect(value).toBe(1);
    expect(port.requests).toEqual([
      {
        kind: "buttons",
        prompt: "Pick",
        options: [
          { name: "One", value: 1 },
          { name: "Two", value: "Two" },
        ],
      },
    ]);
  });

  it("pass/fail offers Pass and Fail and maps the click to a boolean", async () => {
    const port = cannedPort({ kind: "value", value: true }, { kind: "value", value: false });
    const prompts = new OperatorPrompts(port);

    expect(await prompts.passFail()).toBe(true);
    expect(await prompts.passFail()).toBe(false);
    expect(port.requests[0]).toEqual({
      kind: "pass_fail",
      prompt: "",
      options: [
        { name: "Pass", value: true },
        { name: "Fail", value: false },
      ],
    });
  });

  it("text input defaults its size", async () => {
    const port = cannedPort({ kind: "text", text: "Ada" }, { kind: "text", text: "" });
    const prompts = new OperatorPrompts(port);

    expect(await prompts.textInput("What is your name?")).toBe("Ada");
    expect(await prompts.textInput("Serial?", { size: 25 })).toBe("");
    expect(port.requests).toEqual([
      { kind: "text_input", prompt: "What is your name?", options: [], size: 50 },
      { kind: "text_input", prompt: "Serial?", options: [], size: 25 },
    ]);
  });

  it("select asks for one option unless multiple are allowed", async () => {
    const port = cannedPort(
      { kind: "option", option: { name: "Red", value: "Red" } },
      { kind: "options", options: [] },
    );
    const prompts = new OperatorPrompts(port);

    expect(await prompts.select("Pick", ["Red", "Blue"])).toEqual({ name: "Red", value: "Red" });
    expect(await prompts.select("Pick", ["Red", "Blue"], { allowMultiple: true })).toEqual([]);
    expect(port.requests.map((r) => (r.kind === "select" ? r.allow_multiple : null))).toEqual([false, true]);
  });

  it("rejects a response of the wrong shape", async () => {
    const prompts = new OperatorPrompts(cannedPort({ kind: "value", value: "x" }));

    await expect(prompts.textInput("Name?")).rejects.toBeInstanceOf(ValidationError);
    await expect(new OperatorPrompts(cannedPort({ kind: "value", value: "x" })).checkboxes("Pick", ["A"])).rejects.toThrow(
      "Expected a response of kind options, got value",
    );
  });
});
