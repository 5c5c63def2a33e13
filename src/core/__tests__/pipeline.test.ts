import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";

import { reviewProject } from "../pipeline.js";
import { NodeDirectoryWalker } from "../catalog.js";
import type { DirectoryWalker } from "../../utils/types.js";
import { ConfigError, InvalidProjectPathError } from "../../utils/errors.js";
import { makeProject, removeProject, ScriptedCollaborator } from "./fakes.js";

test("reviewProject runs a small project end to end", async () => {
  const root = await makeProject({
    "README.md": "Demo",
    "main.py": "print(1)",
    "notes.txt": "not reviewed",
  });
  const collaborator = new ScriptedCollaborator();

  try {
    const report = await reviewProject({ project: root, description: "A demo app", collaborator });

    assert.equal(collaborator.calls.length, 4);
    const intake = collaborator.lastUserContent(1);
    assert.ok(intake.includes("A demo app"));
    assert.ok(intake.includes("This is the provided README.md file:\n\nDemo\n\n"));
    assert.ok(collaborator.lastUserContent(2).includes("├── README.md\n├── main.py\n├── notes.txt"));
    assert.ok(collaborator.lastUserContent(3).includes("File: main.py\nCode:\n```py\nprint(1)\n```"));
    assert.deepEqual(report.outcomes, [{ status: "reviewed", relativePath: "main.py", reply: "reply 3" }]);
    assert.equal(report.summary, "reply 4");
    assert.equal(report.turnCount, 8);
  } finally {
    await removeProject(root);
  }
});

test("description.txt overrides the given description and a missing README uses the sentinel", async () => {
  const root = await makeProject({
    "description.txt": "  Inventory service  \n",
    "app.js": "module.exports = {};",
  });
  const collaborator = new ScriptedCollaborator();

  try {
    await reviewProject({ project: root, description: "ignored", collaborator });
    const intake = collaborator.lastUserContent(1);
    assert.ok(intake.startsWith("This is a description of the project:\n\nInventory service\n\n"));
    assert.ok(intake.includes("README.md not found."));
    assert.ok(!intake.includes("ignored"));
  } finally {
    await removeProject(root);
  }
});

test("reviewProject fails before any chat request on an invalid root", async () => {
  const collaborator = new ScriptedCollaborator();
  const missing = path.join(path.sep, "definitely", "missing", "project");

  await assert.rejects(
    reviewProject({ project: missing, description: "x", collaborator }),
    InvalidProjectPathError,
  );
  assert.equal(collaborator.calls.length, 0);
});

test("reviewProject fails before any chat request on a broken config file", async () => {
  const root = await makeProject({ ".project-review.json": "{ not json", "main.py": "" });
  const collaborator = new ScriptedCollaborator();

  try {
    await assert.rejects(reviewProject({ project: root, description: "x", collaborator }), ConfigError);
    assert.equal(collaborator.calls.length, 0);
  } finally {
    await removeProject(root);
  }
});

test("reviewProject applies the file limit with priority files first", async () => {
  const root = await makeProject({
    "a_helpers.py": "",
    "b_utils.py": "",
    "z_main.py": "",
  });
  const collaborator = new ScriptedCollaborator();

  try {
    const report = await reviewProject({ project: root, description: "x", limit: 2, collaborator });
    assert.deepEqual(
      report.outcomes.map((o) => o.relativePath),
      ["z_main.py", "a_helpers.py"],
    );
    assert.equal(collaborator.calls.length, 5);
  } finally {
    await removeProject(root);
  }
});

test("reviewProject honours extensions from the project config file", async () => {
  const root = await makeProject({
    ".project-review.json": JSON.stringify({ allowed_extensions: [".RS"], max_file_chars: 4 }),
    "lib.rs": "fn main() {}",
    "main.py": "print(1)",
  });
  const collaborator = new ScriptedCollaborator();

  try {
    const report = await reviewProject({ project: root, description: "x", collaborator });
    assert.deepEqual(report.outcomes.map((o) => o.relativePath), ["lib.rs"]);
    assert.ok(collaborator.lastUserContent(3).endsWith("```rs\nfn m\n```"));
  } finally {
    await removeProject(root);
  }
});

test("reviewProject keeps going past an unreadable subdirectory", async () => {
  const root = await makeProject({
    "main.py": "print(1)",
    "locked/secret.py": "x = 1",
  });
  const locked = path.join(root, "locked");
  const fsWalker = new NodeDirectoryWalker();
  const walker: DirectoryWalker = {
    kind: (target) => fsWalker.kind(target),
    list: async (dir) => {
      if (dir === locked) {
        throw new Error(`EACCES: permission denied, scandir '${locked}'`);
      }
      return fsWalker.list(dir);
    },
  };
  const collaborator = new ScriptedCollaborator();

  try {
    const report = await reviewProject({ project: root, description: "x", collaborator, walker });
    assert.equal(collaborator.calls.length, 4);
    assert.ok(collaborator.lastUserContent(2).includes("├── locked\n├── main.py"));
    assert.deepEqual(report.outcomes.map((o) => o.relativePath), ["main.py"]);
  } finally {
    await removeProject(root);
  }
});
