import test from "node:test";
import assert from "node:assert/strict";

import {
  getDescriptionPrompt,
  getFileReviewPrompt,
  getStructurePrompt,
  truncateToChars,
} from "../review-prompts.js";

test("truncateToChars counts code points and leaves short content alone", () => {
  assert.equal(truncateToChars("héllo😀xyz", 6), "héllo😀");
  assert.equal(truncateToChars("short", 3000), "short");
  assert.equal(truncateToChars("abcdef", 6), "abcdef");
});

test("getFileReviewPrompt names the file and fences the code with its language", () => {
  const prompt = getFileReviewPrompt(
    { absolutePath: "/proj/src/Main.CPP", relativePath: "src/Main.CPP", extension: ".cpp", priority: true },
    "int main() {}",
  );
  assert.equal(
    prompt,
    [
      "You are a senior code reviewer. Please review the following file for:",
      "- Bugs",
      "- Security issues",
      "- Logic errors",
      "- Style issues",
      "- Maintainability",
      "",
      "File: src/Main.CPP",
      "Code:",
      "```cpp",
      "int main() {}",
      "```",
    ].join("\n"),
  );
});

test("description and structure prompts embed their inputs", () => {
  const description = getDescriptionPrompt({ root: "/proj", description: "A demo app", readme: "Demo" });
  assert.ok(description.startsWith("This is a description of the project:\n\nA demo app\n\n"));
  assert.ok(description.includes("This is the provided README.md file:\n\nDemo\n\n"));

  assert.equal(
    getStructurePrompt("├── main.py"),
    "Here is the project's folder structure:\n\n├── main.py\n\nComment on any organization or architecture issues.",
  );
});
