import { describe, it, expect } from "vitest";

import {
  type AssistantClient,
  buildPrompt,
  parseLineRange,
  replacementOperation,
  stripCodeFences,
  suggestEdit,
  type SubmitOptions,
} from "../../../src/assist/index.js";
import { ConfigError } from "../../../src/core/errors.js";

class FakeAssistant implements AssistantClient {
  readonly prompts: string[] = [];

  constructor(private readonly answer: string) {}

  submit(prompt: string, _options: SubmitOptions): Promise<string> {
    this.prompts.push(prompt);
    return Promise.resolve(this.answer);
  }
}

const OPTIONS: SubmitOptions = { timeoutMs: 1000 };

describe("suggestEdit", () => {
  const text = "flask>=2.0\nrequests==2.28.0\nnumpy\n";

  it("turns the answer for a line range into a replace", async () => {
    const client = new FakeAssistant("```\nrequests==2.31.0\n```");

    const suggestion = await suggestEdit(
      { path: "requirements.txt", text, instruction: "pin requests to 2.31.0", range: { start: 2, end: 2 } },
      client,
      OPTIONS
    );

    expect(client.prompts).toEqual([
      "File: requirements.txt (lines 2-2)\nInstruction: pin requests to 2.31.0\n\n```\nrequests==2.28.0\n```",
    ]);
    expect(suggestion.answer).toBe("requests==2.31.0");
    expect(suggestion.plan).toEqual({
      path: "requirements.txt",
      operations: [{ op: "replace", line: 2, endLine: 2, text: "requests==2.31.0\n" }],
      skipped: [],
    });
    expect(suggestion.postEditText).toBe("flask>=2.0\nrequests==2.31.0\nnumpy\n");
    expect(suggestion.diff).toBe(
      "--- a/requirements.txt\n+++ b/requirements.txt\n@@ -1,3 +1,3 @@\n" +
        " flask>=2.0\n-requests==2.28.0\n+requests==2.31.0\n numpy\n"
    );
  });

  it("produces an empty plan when the answer changes nothing", async () => {
    const suggestion = await suggestEdit(
      { path: "notes.txt", text: "a\nb\n", instruction: "keep it" },
      new FakeAssistant("a\nb"),
      OPTIONS
    );

    expect(suggestion.plan.operations).toEqual([]);
    expect(suggestion.postEditText).toBe("a\nb\n");
    expect(suggestion.diff).toBe("");
  });

  it("writes the answer with the file's line endings", async () => {
    const suggestion = await suggestEdit(
      { path: "notes.txt", text: "a\r\nb\r\n", instruction: "capitalize b" },
      new FakeAssistant("a\nB\n"),
      OPTIONS
    );

    expect(suggestion.postEditText).toBe("a\r\nB\r\n");
  });

  it("deletes the range when the answer is empty", async () => {
    const suggestion = await suggestEdit(
      { path: "notes.txt", text: "a\nb\nc\n", instruction: "drop b", range: { start: 2, end: 2 } },
      new FakeAssistant(""),
      OPTIONS
    );

    expect(suggestion.plan.operations).toEqual([{ op: "delete", line: 2, endLine: 2, text: "" }]);
    expect(suggestion.postEditText).toBe("a\nc\n");
  });

  it("rejects a range past the end of the file", async () => {
    const client = new FakeAssistant("x");

    await expect(
      suggestEdit({ path: "f", text: "a\n", instruction: "x", range: { start: 1, end: 3 } }, client, OPTIONS)
    ).rejects.toThrow(new ConfigError("f has 1 lines; cannot select 1-3"));
    expect(client.prompts).toEqual([]);
  });
});

describe("replacementOperation", () => {
  it("inserts when only lines are added", () => {
    expect(replacementOperation(["a\n", "c\n"], ["a\n", "b\n", "c\n"], 1)).toEqual({
      op: "insert",
      line: 1,
      endLine: 1,
      text: "b\n",
    });
  });

  it("offsets by the first line of the range", () => {
    expect(replacementOperation(["x\n", "y\n"], ["x\n", "Y\n"], 10)).toEqual({
      op: "replace",
      line: 11,
      endLine: 11,
      text: "Y\n",
    });
  });

  it("is null when nothing changes", () => {
    expect(replacementOperation(["a\n"], ["a\n"], 1)).toBeNull();
  });
});

describe("stripCodeFences", () => {
  it("unwraps a fenced answer", () => {
    expect(stripCodeFences("```python\nx = 1\n```\n")).toBe("x = 1");
  });

  it("leaves plain answers alone", () => {
    expect(stripCodeFences("x = 1\n")).toBe("x = 1\n");
  });
});

describe("parseLineRange", () => {
  it("parses ranges and single lines", () => {
    expect(parseLineRange("3-5")).toEqual({ start: 3, end: 5 });
    expect(parseLineRange("4")).toEqual({ start: 4, end: 4 });
  });

  it("rejects reversed, zero and malformed ranges", () => {
    expect(parseLineRange("5-3")).toBeNull();
    expect(parseLineRange("0-2")).toBeNull();
    expect(parseLineRange("x")).toBeNull();
  });
});

describe("buildPrompt", () => {
  it("drops the trailing newline of the selection", () => {
    expect(
      buildPrompt({ path: "a.py", text: "", instruction: "rename" }, "x = 1\r\n", { start: 1, end: 1 })
    ).toBe("File: a.py (lines 1-1)\nInstruction: rename\n\n```\nx = 1\n```");
  });
});
