import { describe, test, expect } from "vitest";
import { encodePath, escapeLabel, labelFor, renderList } from "../src/section/render.js";
import type { NoteRecord } from "../src/schema.js";

const createRecord = (overrides: Partial<NoteRecord> = {}): NoteRecord => ({
  path: "notes/2024-03-01-standup.md",
  date: new Date(2024, 2, 1),
  title: "Standup",
  ...overrides,
});

describe("escapeLabel", () => {
  test("escapes brackets", () => {
    expect(escapeLabel("[note]")).toBe("\\[note\\]");
  });

  test("escapes backslash before brackets", () => {
    expect(escapeLabel("a\\b]")).toBe("a\\\\b\\]");
  });

  test("leaves other text alone", () => {
    expect(escapeLabel("plain (text) *here*")).toBe("plain (text) *here*");
  });
});

describe("encodePath", () => {
  test("encodes spaces and keeps slashes", () => {
    expect(encodePath("daily notes/2024 03.md")).toBe("daily%20notes/2024%2003.md");
  });

  test("encodes reserved punctuation", () => {
    expect(encodePath("a/(draft)!#1?.md")).toBe("a/%28draft%29%21%231%3F.md");
  });

  test("keeps unreserved characters", () => {
    expect(encodePath("a-b_c.d~e/F9.md")).toBe("a-b_c.d~e/F9.md");
  });

  test("encodes non-ascii as utf-8", () => {
    expect(encodePath("notes/café.md")).toBe("notes/caf%C3%A9.md");
  });
});

describe("labelFor", () => {
  const record = createRecord();

  test("filename uses the stem", () => {
    expect(labelFor(record, "filename")).toBe("2024-03-01-standup");
  });

  test("title uses the title", () => {
    expect(labelFor(record, "title")).toBe("Standup");
  });

  test("date_title prefixes the date", () => {
    expect(labelFor(record, "date_title")).toBe("2024-03-01 — Standup");
  });

  test("path uses the relative path", () => {
    expect(labelFor(record, "path")).toBe("notes/2024-03-01-standup.md");
  });
});

describe("renderList", () => {
  test("empty input renders empty string", () => {
    expect(renderList([], "title")).toBe("");
  });

  test("renders one item per record", () => {
    const records = [
      createRecord(),
      createRecord({ path: "my notes/[draft].md", title: "Draft [wip]", date: new Date(2024, 1, 1) }),
    ];

    expect(renderList(records, "title")).toBe(
      "- [Standup](notes/2024-03-01-standup.md)\n" +
        "- [Draft \\[wip\\]](my%20notes/%5Bdraft%5D.md)",
    );
  });

  test("escapes labels in every mode", () => {
    const record = createRecord({ path: "[x].md", title: "[t]" });

    expect(renderList([record], "filename")).toBe("- [\\[x\\]](%5Bx%5D.md)");
    expect(renderList([record], "path")).toBe("- [\\[x\\].md](%5Bx%5D.md)");
  });
});
