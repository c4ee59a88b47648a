import assert from "node:assert/strict";
import test from "node:test";
import { Citation } from "@rag-client/core";
import { ChatRequestFailedError } from "./errors.js";
import { isExitCommand, renderAnswer, renderMissingSettings, renderRequestError } from "./render.js";

test("renderAnswer prints the answer followed by numbered citations", () => {
  const lines = renderAnswer({
    answer: "Dental is covered.",
    citations: [
      new Citation({ title: "Northwind Health Plus", content: "Coverage details" }),
      new Citation({ sourcePath: "docs/standard.pdf" })
    ]
  });

  assert.deepEqual(lines, [
    "",
    "Answer: Dental is covered.",
    "",
    "Citations:",
    "  [1] Northwind Health Plus\n      Coverage details",
    "  [2] docs/standard.pdf",
    ""
  ]);
});

test("renderAnswer skips the citation block when there are none", () => {
  assert.deepEqual(renderAnswer({ answer: "No idea.", citations: [] }), ["", "Answer: No idea.", ""]);
});

test("renderMissingSettings lists missing settings on one line", () => {
  assert.deepEqual(renderMissingSettings(["AZURE_OPENAI_ENDPOINT", "AZURE_SEARCH_INDEX_NAME"]), [
    "Please configure required settings in appsettings.json, .env file or environment variables.",
    "Missing: AZURE_OPENAI_ENDPOINT, AZURE_SEARCH_INDEX_NAME"
  ]);
});

test("renderRequestError shows status and details for failed requests", () => {
  assert.deepEqual(renderRequestError(new ChatRequestFailedError({ status: 400, body: '{"error":"bad"}' })), [
    "Error: Chat completions request failed with status 400",
    "Status: 400",
    'Details: {"error":"bad"}',
    ""
  ]);
});

test("renderRequestError names other errors and their cause", () => {
  const error = new TypeError("fetch failed", { cause: new Error("getaddrinfo ENOTFOUND") });

  assert.deepEqual(renderRequestError(error), [
    "Error: TypeError: fetch failed",
    "Inner: getaddrinfo ENOTFOUND",
    ""
  ]);
});

test("isExitCommand stops on empty input or exit in any case", () => {
  assert.equal(isExitCommand(""), true);
  assert.equal(isExitCommand("EXIT"), true);
  assert.equal(isExitCommand("exit now"), false);
  assert.equal(isExitCommand("What is covered?"), false);
});
