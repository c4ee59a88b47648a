import assert from "node:assert/strict";
import test from "node:test";
import type { AzureSearchDataSource, CitationParser } from "@rag-client/core";
import { ChatRequestFailedError, EmptyAnswerError } from "./errors.js";
import type { StructuredLogEvent } from "./logging.js";
import { CONNECTION_CHECK_PROMPT, ChatSession, DEFAULT_SYSTEM_PROMPT } from "./session.js";
import { FakeTransport, completion } from "./testing/fake-transport.js";

const dataSource: AzureSearchDataSource = {
  type: "azure_search",
  parameters: {
    endpoint: "https://search.example.test",
    index_name: "health-plans",
    authentication: { type: "api_key", key: "test-secret" }
  }
};

test("ChatSession.ask sends history with the data source and returns citations", async () => {
  const transport = new FakeTransport([
    completion("Dental is covered.", [
      { title: "Northwind Health Plus", filepath: "docs/health-plus.pdf", content: "Coverage details" }
    ])
  ]);
  const session = new ChatSession({ transport, dataSource });

  const result = await session.ask("Is dental covered?");

  assert.equal(result.answer, "Dental is covered.");
  assert.equal(result.citations.length, 1);
  assert.equal(result.citations[0]?.title, "Northwind Health Plus");
  assert.deepEqual(transport.requests[0], {
    messages: [
      { role: "system", content: DEFAULT_SYSTEM_PROMPT },
      { role: "user", content: "Is dental covered?" }
    ],
    dataSources: [dataSource]
  });
  assert.deepEqual(session.history, [
    { role: "system", content: DEFAULT_SYSTEM_PROMPT },
    { role: "user", content: "Is dental covered?" },
    { role: "assistant", content: "Dental is covered." }
  ]);
});

test("ChatSession.ask carries earlier turns into the next request", async () => {
  const transport = new FakeTransport([completion("First."), completion("Second.")]);
  const session = new ChatSession({ transport, systemPrompt: "Be brief." });

  await session.ask("one");
  const second = await session.ask("two");

  assert.equal(second.answer, "Second.");
  assert.deepEqual(second.citations, []);
  assert.deepEqual(transport.requests[1]?.messages, [
    { role: "system", content: "Be brief." },
    { role: "user", content: "one" },
    { role: "assistant", content: "First." },
    { role: "user", content: "two" }
  ]);
  assert.equal(transport.requests[1]?.dataSources, undefined);
});

test("ChatSession.ask keeps the user turn when the request fails", async () => {
  const failure = new ChatRequestFailedError({ status: 500, body: "oops" });
  const session = new ChatSession({ transport: new FakeTransport([failure]) });

  await assert.rejects(session.ask("Is vision covered?"), failure);
  assert.deepEqual(session.history.map((message) => message.role), ["system", "user"]);
});

test("ChatSession.ask raises EmptyAnswerError when the response has no answer", async () => {
  const session = new ChatSession({ transport: new FakeTransport([completion(null)]) });

  await assert.rejects(session.ask("anything"), EmptyAnswerError);
});

test("ChatSession.checkConnection sends a single prompt without history or data source", async () => {
  const transport = new FakeTransport([completion("Hello")]);
  const session = new ChatSession({ transport, dataSource });

  assert.equal(await session.checkConnection(), "Hello");
  assert.deepEqual(transport.requests[0], {
    messages: [{ role: "user", content: CONNECTION_CHECK_PROMPT }],
    dataSources: undefined
  });
  assert.equal(session.history.length, 1);
});

test("ChatSession logs start and done events with a citation count", async () => {
  const events: StructuredLogEvent[] = [];
  const session = new ChatSession({
    transport: new FakeTransport([completion("Yes.", [{ title: "A" }, { title: "B" }])]),
    sessionId: "session-1",
    deployment: "gpt-4",
    logger: (event) => events.push(event)
  });

  await session.ask("question");

  assert.deepEqual(
    events.map((event) => event.event),
    ["chat.request.start", "chat.request.done"]
  );
  assert.equal(events[1]?.sessionId, "session-1");
  assert.equal(events[1]?.deployment, "gpt-4");
  assert.equal(events[1]?.stage, "rag_query");
  assert.equal(events[1]?.turn, 1);
  assert.equal(events[1]?.citationCount, 2);
  assert.equal(events[0]?.correlationId, events[1]?.correlationId);
});

test("ChatSession logs a failed event before rethrowing", async () => {
  const events: StructuredLogEvent[] = [];
  const session = new ChatSession({
    transport: new FakeTransport([new ChatRequestFailedError({ status: 403, body: "" })]),
    logger: (event) => events.push(event)
  });

  await assert.rejects(session.checkConnection(), ChatRequestFailedError);
  assert.equal(events[1]?.event, "chat.request.failed");
  assert.equal(events[1]?.stage, "connection_check");
  assert.equal(events[1]?.errorName, "ChatRequestFailedError");
  assert.equal(events[1]?.errorMessage, "Chat completions request failed with status 403");
});

test("ChatSession caps error message and stack in the failed event", async () => {
  const failure = new Error("x".repeat(700));
  failure.stack = "s".repeat(2500);
  const events: StructuredLogEvent[] = [];
  const session = new ChatSession({
    transport: new FakeTransport([failure]),
    logger: (event) => events.push(event)
  });

  await assert.rejects(session.ask("question"), failure);
  assert.equal(events[1]?.event, "chat.request.failed");
  assert.equal(events[1]?.errorName, "Error");
  assert.equal(events[1]?.errorMessage, `${"x".repeat(500)}…`);
  assert.equal(events[1]?.errorStack?.length, 2001);
});

test("ChatSession records the status of failed chat requests", async () => {
  const events: StructuredLogEvent[] = [];
  const session = new ChatSession({
    transport: new FakeTransport([new ChatRequestFailedError({ status: 429, body: "" })]),
    logger: (event) => events.push(event)
  });

  await assert.rejects(session.ask("question"), ChatRequestFailedError);
  assert.equal(events[1]?.status, 429);
});

test("ChatSession.ask keeps the answer when the citation parser throws", async () => {
  const throwingParser: CitationParser = {
    parseCitations() {
      throw new Error("unexpected citation shape");
    },
    formatCitation() {
      return "";
    },
    truncateContent() {
      return "";
    }
  };
  const events: StructuredLogEvent[] = [];
  const session = new ChatSession({
    transport: new FakeTransport([completion("Vision is covered.", [{ title: "A" }])]),
    citationParser: throwingParser,
    logger: (event) => events.push(event)
  });

  const result = await session.ask("Is vision covered?");

  assert.equal(result.answer, "Vision is covered.");
  assert.deepEqual(result.citations, []);
  assert.deepEqual(session.history.map((message) => message.role), ["system", "user", "assistant"]);
  assert.deepEqual(
    events.map((event) => event.event),
    ["chat.request.start", "chat.citations.failed", "chat.request.done"]
  );
  assert.equal(events[1]?.errorMessage, "unexpected citation shape");
});
