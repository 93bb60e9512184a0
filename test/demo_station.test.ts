import { describe, expect, it } from "vitest";
import { Sequencer } from "../src/core/sequencer.js";
import { InteractionChannel } from "../src/interaction/channel.js";
import { StaticSecretStore } from "../src/secrets/store.js";
import { plan } from "../src/stations/demo.js";
import type { InteractionRequestMessage } from "../src/types/interaction.js";
import { attachScriptedConsole, type Responder } from "./helpers/scripted-console.js";

function operatorAnswers(request: InteractionRequestMessage): unknown {
  switch (request.kind) {
    case "buttons":
      return request.prompt === "Pick a letter" ? "B" : 2;
    case "pass_fail":
      return true;
    case "text_input":
      return "Ada";
    case "radios":
      return "Green";
    case "checkboxes":
      return ["Blue", "Red"];
    case "select":
      return ["Green"];
  }
}

async function runDemo(secrets: Record<string, string>, answers: Responder = operatorAnswers) {
  const channel = new InteractionChannel({ runId: "demo-1" });
  const operator = attachScriptedConsole(channel, answers);
  const result = await new Sequencer({
    runId: "demo-1",
    channel,
    secrets: new StaticSecretStore(secrets),
    stationId: "station-01",
  }).execute(plan);
  return { result, operator };
}

describe("demo station", () => {
  it("runs every step, failing only the step built to fail", async () => {
    const { result } = await runDemo({ FOO: "test-secret" });

    expect(result.steps).toHaveLength(16);
    const failing = result.steps.filter((s) => s.outcome.status !== "passed").map((s) => s.id);
    expect(failing).toEqual(["StepThatCanFail"]);
    expect(result.stop).toEqual({ kind: "completed" });
    expect(result.verdict).toBe("failed");
    expect(result.finalizer?.id).toBe("Shutdown");
    expect(result.finalizer?.outcome).toEqual({ status: "passed" });
  });

  it("resolves the declared metadata", async () => {
    const { result } = await runDemo({ FOO: "test-secret" });
    const byId = new Map(result.steps.map((s) => [s.id, s]));

    expect(byId.get("StepWithDisplayName")?.display_name).toBe("This is a custom display name");
    expect(byId.get("StepWithDescription")?.description).toBe("This is a custom description");
    expect(byId.get("StepWithDescription")?.display_name).toBe("Step With Description");
    expect(byId.get("StepThatCanFail")?.stop_on_fail).toBe(false);
    expect(byId.get("StepWithImage")?.image).toBe("img/puppy.jpg");
    expect(byId.get("StepWithLink")?.link).toEqual({ url: "https://www.example.com" });
    expect(byId.get("StepWithLinkText")?.link).toEqual({ url: "https://www.example.com", text: "This is the link text" });
    expect(byId.get("StepWithCheckBoxes")?.display_name).toBe("Step With Check Boxes");
  });

  it("passes state, operator answers and secrets through to the steps", async () => {
    const { result, operator } = await runDemo({ FOO: "test-secret" });
    const logsOf = (id: string) => result.steps.find((s) => s.id === id)?.logs.map((l) => l.text);

    expect(logsOf("EmptyStep")).toEqual(["This step does nothing but log", "This line goes to stderr"]);
    expect(result.steps[0].logs.map((l) => l.stream)).toEqual(["out", "err"]);
    expect(logsOf("StepThatReadsState")).toEqual(["Foo is Bar", "Baz is 42"]);
    expect(logsOf("StepWithButtons")).toEqual(["You picked B", "You picked 2"]);
    expect(logsOf("PassFailButtons")).toEqual(["You clicked Pass"]);
    expect(logsOf("StepWithTextInput")).toEqual(["Hello, Ada"]);
    expect(logsOf("StepWithRadios")).toEqual(["You picked Green"]);
    expect(logsOf("StepWithCheckBoxes")).toEqual(["You picked Red, Blue"]);
    expect(logsOf("StepWithSelect")).toEqual(["You picked Green"]);
    expect(logsOf("StepThatReadsSecret")).toEqual(["Secret FOO has 11 characters"]);

    expect(operator.requests().map((r) => r.kind)).toEqual([
      "buttons",
      "buttons",
      "pass_fail",
      "text_input",
      "radios",
      "checkboxes",
      "select",
    ]);
    expect(operator.requests()[3].constraints).toEqual({ size: 25 });
  });

  it("logs a Fail click without failing the run", async () => {
    const { result } = await runDemo({ FOO: "test-secret" }, (request) =>
      request.kind === "pass_fail" ? false : operatorAnswers(request),
    );
    const passFail = result.steps.find((s) => s.id === "PassFailButtons");

    expect(passFail?.outcome).toEqual({ status: "passed" });
    expect(passFail?.logs.map((l) => l.text)).toEqual(["You clicked Fail"]);
    expect(result.stop).toEqual({ kind: "completed" });
  });

  it("offers a button whose value is true", async () => {
    const { operator } = await runDemo({ FOO: "test-secret" });

    expect(operator.requests()[1].options).toEqual([
      { name: "One", value: 1 },
      { name: "This is green", value: true },
      { name: "Two", value: 2 },
    ]);
  });

  it("errors the secret step when FOO is not provided", async () => {
    const { result } = await runDemo({});
    const secretStep = result.steps[15];

    expect(secretStep.id).toBe("StepThatReadsSecret");
    expect(secretStep.outcome.status).toBe("errored");
    expect(result.finalizer?.outcome).toEqual({ status: "passed" });
  });
});
