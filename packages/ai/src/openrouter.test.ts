import assert from "node:assert/strict";
import test from "node:test";
import { OpenRouterClient, extractMessageContent, parseJsonContent } from "./openrouter.js";

test("parseJsonContent strips markdown fences", () => {
  const parsed = parseJsonContent("```json\n{\"cust_id\": \"Customer ID\"}\n```");
  assert.deepEqual(parsed, { cust_id: "Customer ID" });
});

test("parseJsonContent extracts an object surrounded by prose", () => {
  const parsed = parseJsonContent("Here is the mapping: {\"order_amt\": \"Order Amount\"} Hope this helps.");
  assert.deepEqual(parsed, { order_amt: "Order Amount" });
});

test("parseJsonContent reports invalid JSON with a stable code", () => {
  assert.throws(
    () => parseJsonContent("no structured content here"),
    (error: unknown) => error instanceof Error && "code" in error && error.code === "OPENROUTER_INVALID_JSON",
  );
});

test("chat refuses to run without an API key", async () => {
  const client = new OpenRouterClient({ apiKey: "" });

  assert.equal(client.isConfigured(), false);
  await assert.rejects(() => client.chat([{ role: "user", content: "hi" }]), /OPENROUTER_API_KEY is missing/);
});

test("extractMessageContent reads the first choice and ignores malformed payloads", () => {
  assert.equal(extractMessageContent({ choices: [{ message: { content: "bar chart" } }] }), "bar chart");
  assert.equal(extractMessageContent({ choices: [{ message: { content: "   " } }] }), undefined);
  assert.equal(extractMessageContent({ choices: [] }), undefined);
  assert.equal(extractMessageContent({ choices: "nope" }), undefined);
  assert.equal(extractMessageContent(null), undefined);
});
