import test from "node:test";
import assert from "node:assert/strict";

import { DEFAULT_REVIEW_CONFIG, loadReviewConfig } from "../review-config.js";
import { ConfigError } from "../errors.js";
import { DEFAULT_ALLOWED_EXTENSIONS } from "../constants.js";
import { makeProject, removeProject } from "../../core/__tests__/fakes.js";

test("loadReviewConfig returns frozen defaults when no config file exists", async () => {
  const root = await makeProject({});
  try {
    const config = await loadReviewConfig(root);
    assert.deepEqual(config, DEFAULT_REVIEW_CONFIG);
    assert.ok(Object.isFrozen(config));
    assert.equal(config.max_file_chars, 3000);
    assert.equal(config.model, "gemma3:1b");
  } finally {
    await removeProject(root);
  }
});

test("loadReviewConfig replaces only the keys the file provides", async () => {
  const root = await makeProject({
    ".project-review.json": JSON.stringify({
      allowed_extensions: [".RS", ".kt"],
      importance_markers: ["Server"],
      max_file_chars: 500,
    }),
  });
  try {
    const config = await loadReviewConfig(root);
    assert.deepEqual(config.allowed_extensions, [".rs", ".kt"]);
    assert.deepEqual(config.importance_markers, ["server"]);
    assert.equal(config.max_file_chars, 500);
    assert.equal(config.model, "gemma3:1b");
    assert.deepEqual(config.excluded_dirs, DEFAULT_REVIEW_CONFIG.excluded_dirs);
    assert.equal(config.host, "http://127.0.0.1:11434");
  } finally {
    await removeProject(root);
  }
});

test("loadReviewConfig takes endpoint settings only from explicit overrides", async () => {
  const root = await makeProject({});
  try {
    const config = await loadReviewConfig(root, {
      model: "qwen2.5-coder",
      host: "http://gpu-box:11434",
      request_timeout_ms: 1000,
    });
    assert.equal(config.model, "qwen2.5-coder");
    assert.equal(config.host, "http://gpu-box:11434");
    assert.equal(config.request_timeout_ms, 1000);
  } finally {
    await removeProject(root);
  }
});

test("loadReviewConfig refuses endpoint settings from the reviewed project", async () => {
  const bodies = [
    JSON.stringify({ host: "https://collector.example.net" }),
    JSON.stringify({ model: "llama3" }),
    JSON.stringify({ request_timeout_ms: 5 }),
  ];
  for (const body of bodies) {
    const root = await makeProject({ ".project-review.json": body });
    try {
      await assert.rejects(loadReviewConfig(root, { host: "http://127.0.0.1:11434" }), ConfigError);
    } finally {
      await removeProject(root);
    }
  }
});

test("loadReviewConfig hands out lists that cannot change the defaults", async () => {
  const root = await makeProject({});
  try {
    const config = await loadReviewConfig(root);
    assert.ok(Object.isFrozen(config.allowed_extensions));
    assert.ok(Object.isFrozen(config.excluded_dirs));
    assert.ok(Object.isFrozen(config.importance_markers));
    assert.notEqual(config.allowed_extensions, DEFAULT_ALLOWED_EXTENSIONS);
    assert.throws(() => {
      Reflect.apply(Array.prototype.push, config.allowed_extensions, [".rb"]);
    }, TypeError);
    assert.equal(DEFAULT_ALLOWED_EXTENSIONS.includes(".rb"), false);
  } finally {
    await removeProject(root);
  }
});

test("loadReviewConfig rejects malformed JSON, unknown keys and invalid values", async () => {
  const cases = ["{ nope", JSON.stringify({ extensions: [".py"] }), JSON.stringify({ max_file_chars: -1 })];
  for (const body of cases) {
    const root = await makeProject({ ".project-review.json": body });
    try {
      await assert.rejects(loadReviewConfig(root), ConfigError);
    } finally {
      await removeProject(root);
    }
  }
});
