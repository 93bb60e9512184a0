import { describe, expect, it } from "vitest";
import {
  InteractionCancelledError,
  InteractionTimeoutError,
  TransportError,
  ValidationError,
} from "../src/core/errors.js";
import { InteractionChannel } from "../src/interaction/channel.js";
import type { InteractionRequest } from "../src/types/interaction.js";
import { attachScriptedConsole } from "./helpers/scripted-console.js";

const GO: InteractionRequest = { kind: "buttons", prompt: "Go?", options: [{ name: "Go", value: "go" }] };

describe("interaction channel", () => {
  it("buffers output until a console attaches, then flushes it in order", async () => {
    const channel = new InteractionChannel({ runId: "run-1" });
    channel.sendLog("out", "a");
    channel.sendLog("err", "b");
    expect(channel.isAttached).toBe(false);

    const operator = attachScriptedConsole(channel);
    await channel.flush();

    expect(operator.messages).toEqual([
      { type: "log", run_id: "run-1", stream: "out", text: "a" },
      { type: "log", run_id: "run-1", stream: "err", text: "b" },
    ]);
  });

  it("delivers a request issued before attach once the console connects", async () => {
    const channel = new InteractionChannel({ runId: "run-1" });
    const pending = channel.request(GO);
    attachScriptedConsole(channel, ["go"]);

    await expect(pending).resolves.toEqual({ kind: "value", value: "go" });
  });

  it("keeps logs and requests in call order and numbers request ids", async () => {
    const channel = new InteractionChannel({ runId: "run-1" });
    const operator = attachScriptedConsole(channel, ["go", "go"]);

    channel.sendLog("out", "before");
    await channel.request(GO);
    channel.sendLog("out", "between");
    await channel.request(GO);
    await channel.flush();

    expect(operator.messages.map((m) => (m.type === "log" ? m.text : m.id))).toEqual([
      "before",
      "run-1:1",
      "between",
      "run-1:2",
    ]);
  });

  it("sends text input size and select multiplicity as constraints", async () => {
    const channel = new InteractionChannel({ runId: "run-1" });
    const operator = attachScriptedConsole(channel, ["Ada", []]);

    await channel.request({ kind: "text_input", prompt: "Name?", options: [], size: 25 });
    await channel.request({ kind: "select", prompt: "Pick", options: [{ name: "A", value: "A" }], allow_multiple: true });

    expect(operator.requests().map((r) => r.constraints)).toEqual([{ size: 25 }, { allow_multiple: true }]);
  });

  it("times out with the channel default", async () => {
    const channel = new InteractionChannel({ runId: "run-1", defaultTimeoutMs: 20 });
    attachScriptedConsole(channel);

    const pending = channel.request(GO);
    await expect(pending).rejects.toBeInstanceOf(InteractionTimeoutError);
    await expect(pending).rejects.toThrow("No operator response to run-1:1 within 20ms");
    expect(channel.pendingIds()).toEqual([]);
  });

  it("lets a request override the default timeout", async () => {
    const channel = new InteractionChannel({ runId: "run-1" });
    attachScriptedConsole(channel);

    await expect(channel.request(GO, { timeoutMs: 10 })).rejects.toThrow("No operator response to run-1:1 within 10ms");
  });

  it("refuses timeouts longer than a timer can wait", async () => {
    expect(() => new InteractionChannel({ runId: "run-1", defaultTimeoutMs: 2_592_000_000 })).toThrow(
      "Interaction timeout 2592000000ms exceeds the maximum of 2147483647ms",
    );

    const channel = new InteractionChannel({ runId: "run-1" });
    attachScriptedConsole(channel);
    await expect(channel.request(GO, { timeoutMs: 2_147_483_648 })).rejects.toBeInstanceOf(RangeError);
    expect(channel.pendingIds()).toEqual([]);
  });

  it("accepts the longest timer delay without firing early", async () => {
    const channel = new InteractionChannel({ runId: "run-1", defaultTimeoutMs: 2_147_483_647 });
    attachScriptedConsole(channel);

    const pending = channel.request(GO);
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(channel.pendingIds()).toEqual(["run-1:1"]);

    channel.close();
    await expect(pending).rejects.toBeInstanceOf(InteractionCancelledError);
  });

  it("refuses a response that arrives after its timeout", async () => {
    const channel = new InteractionChannel({ runId: "run-1", defaultTimeoutMs: 10 });
    attachScriptedConsole(channel);

    await expect(channel.request(GO)).rejects.toBeInstanceOf(InteractionTimeoutError);
    expect(channel.deliver({ type: "interaction_response", id: "run-1:1", selection: "go" })).toEqual({
      ok: false,
      error: "No outstanding request with id run-1:1",
    });
  });

  it("cancels the outstanding wait when the operator disconnects and buffers later output", async () => {
    const channel = new InteractionChannel({ runId: "run-1" });
    attachScriptedConsole(channel);

    const pending = channel.request(GO);
    channel.detach();

    await expect(pending).rejects.toBeInstanceOf(InteractionCancelledError);
    await expect(pending).rejects.toThrow("Interaction run-1:1 cancelled: operator disconnected");
    expect(channel.isAttached).toBe(false);

    channel.sendLog("out", "while away");
    const next = attachScriptedConsole(channel);
    await channel.flush();
    expect(next.logs().map((m) => m.text)).toEqual(["while away"]);
  });

  it("rejects every wait and further requests once closed", async () => {
    const channel = new InteractionChannel({ runId: "run-1" });
    const operator = attachScriptedConsole(channel);

    const pending = channel.request(GO);
    channel.close();
    channel.close();

    await expect(pending).rejects.toThrow("Interaction run-1:1 cancelled: channel closed");
    await expect(channel.request(GO)).rejects.toThrow("Interaction run-1:2 cancelled: channel closed");
    expect(channel.isClosed).toBe(true);
    expect(() => channel.attach(operator)).toThrow("Cannot attach a console to a closed channel");

    channel.sendLog("out", "ignored");
    await channel.flush();
    expect(operator.logs()).toEqual([]);
  });

  it("refuses a response to an unknown id without disturbing the outstanding request", async () => {
    const channel = new InteractionChannel({ runId: "run-1" });
    attachScriptedConsole(channel);

    const pending = channel.request(GO);
    expect(channel.deliver({ type: "interaction_response", id: "run-1:42", selection: "go" })).toEqual({
      ok: false,
      error: "No outstanding request with id run-1:42",
    });
    expect(channel.pendingIds()).toEqual(["run-1:1"]);

    expect(channel.deliver({ type: "interaction_response", id: "run-1:1", selection: "go" })).toEqual({
      ok: true,
      id: "run-1:1",
    });
    await expect(pending).resolves.toEqual({ kind: "value", value: "go" });
  });

  it("fails the matching request when its response is malformed", async () => {
    const channel = new InteractionChannel({ runId: "run-1" });
    attachScriptedConsole(channel);

    const pending = channel.request(GO);
    const res = channel.deliver({ type: "interaction_response", id: "run-1:1" });

    expect(res).toEqual({ ok: false, error: "data must have required property 'selection'" });
    await expect(pending).rejects.toBeInstanceOf(ValidationError);
    await expect(pending).rejects.toThrow("Malformed response to run-1:1: data must have required property 'selection'");
  });

  it("fails a request whose delivery to the console fails", async () => {
    const channel = new InteractionChannel({ runId: "run-1" });
    channel.attach({
      send: () => {
        throw new Error("pipe broken");
      },
    });

    const pending = channel.request(GO);
    await expect(pending).rejects.toBeInstanceOf(TransportError);
    await expect(pending).rejects.toThrow("Failed to send interaction_request to console: pipe broken");
  });

  it("keeps a failed log delivery as a fault for the sequencer", async () => {
    const channel = new InteractionChannel({ runId: "run-1" });
    channel.attach({
      send: async () => {
        throw new Error("pipe broken");
      },
    });

    channel.sendLog("out", "lost");
    await channel.flush();

    const fault = channel.takeFault();
    expect(fault).toBeInstanceOf(TransportError);
    expect(fault?.message).toBe("Failed to send log to console: pipe broken");
    expect(channel.takeFault()).toBeNull();
  });

  it("rejects a request with ambiguous options", async () => {
    const channel = new InteractionChannel({ runId: "run-1" });

    await expect(
      channel.request({
        kind: "buttons",
        prompt: "",
        options: [
          { name: "A", value: 1 },
          { name: "A", value: 2 },
        ],
      }),
    ).rejects.toThrow("Duplicate option name: A");
    await expect(
      channel.request({
        kind: "buttons",
        prompt: "",
        options: [
          { name: "A", value: 1 },
          { name: "B", value: 1 },
        ],
      }),
    ).rejects.toThrow("Duplicate option value: 1");
  });
});
