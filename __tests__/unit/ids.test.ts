import { describe, it, expect } from "vitest";
import { createIds, uniqueHeadingIds } from "@/lib/ids";

describe("createIds", () => {
  describe("generate", () => {
    it("returns the slug when it is unused", () => {
      const ids = createIds();
      expect(ids.generate("Getting Started", "heading")).toBe("getting-started");
    });

    it("appends -1, -2, etc. for repeated text", () => {
      const ids = createIds();
      expect(ids.generate("Setup", "heading")).toBe("setup");
      expect(ids.generate("Setup", "heading")).toBe("setup-1");
      expect(ids.generate("Setup", "heading")).toBe("setup-2");
      expect(ids.generate("setup!", "heading")).toBe("setup-3");
    });

    it("falls back to 'heading' for headings that slugify to nothing", () => {
      const ids = createIds();
      expect(ids.generate("", "heading")).toBe("heading");
      expect(ids.generate("!!!", "heading")).toBe("heading-1");
      expect(ids.generate("Привет", "heading")).toBe("heading-2");
    });

    it("falls back to 'id' for other elements", () => {
      const ids = createIds();
      expect(ids.generate("", "other")).toBe("id");
      expect(ids.generate("🎉", "other")).toBe("id-1");
    });

    it("skips suffixes that are already taken", () => {
      const ids = createIds();
      expect(ids.generate("x-1", "heading")).toBe("x-1");
      expect(ids.generate("x", "heading")).toBe("x");
      expect(ids.generate("x", "heading")).toBe("x-2");
    });

    it("accepts UTF-8 bytes", () => {
      const ids = createIds();
      expect(ids.generate(new TextEncoder().encode("Café"), "other")).toBe("cafe");
    });

    it("only uses lowercase letters, digits and hyphens", () => {
      const ids = createIds();
      const id = ids.generate("Ça, c'est la vie!", "heading");
      expect(id).toBe("ca-c-est-la-vie");
    });
  });

  describe("put", () => {
    it("makes generate avoid a reserved id", () => {
      const ids = createIds();
      ids.put("intro");
      expect(ids.generate("Intro", "heading")).toBe("intro-1");
    });

    it("reserves suffixed ids too", () => {
      const ids = createIds();
      ids.put("setup-1");
      expect(ids.generate("Setup", "heading")).toBe("setup");
      expect(ids.generate("Setup", "heading")).toBe("setup-2");
    });

    it("stores the id as written, without slugifying", () => {
      const ids = createIds();
      ids.put("My Custom ID");
      expect(ids.has("My Custom ID")).toBe(true);
      expect(ids.has("my-custom-id")).toBe(false);
      expect(ids.generate("My Custom ID", "heading")).toBe("my-custom-id");
    });

    it("can reserve the fallback ids", () => {
      const ids = createIds();
      ids.put("heading");
      ids.put("id");
      expect(ids.generate("", "heading")).toBe("heading-1");
      expect(ids.generate("", "other")).toBe("id-1");
    });

    it("accepts an id that is already present", () => {
      const ids = createIds();
      ids.put("dup");
      ids.put("dup");
      expect(ids.size).toBe(1);
    });
  });

  it("tracks every generated and reserved id", () => {
    const ids = createIds();
    expect(ids.size).toBe(0);
    const a = ids.generate("A", "heading");
    ids.put("b");
    const c = ids.generate("A", "heading");
    expect([a, "b", c].every((id) => ids.has(id))).toBe(true);
    expect(ids.size).toBe(3);
  });

  it("never issues the same id twice", () => {
    const ids = createIds();
    const issued: string[] = [];
    const texts = ["Intro", "intro", "Intro 1", "intro-1", "", "!!", "Intro", "INTRO", "intro 2"];
    ids.put("intro-2");
    issued.push("intro-2");
    for (const text of texts) issued.push(ids.generate(text, "heading"));
    expect(new Set(issued).size).toBe(issued.length);
    expect(issued).toEqual([
      "intro-2",
      "intro",
      "intro-1",
      "intro-1-1",
      "intro-1-2",
      "heading",
      "heading-1",
      "intro-3",
      "intro-4",
      "intro-2-1",
    ]);
  });

  it("keeps registries independent", () => {
    const first = createIds();
    const second = createIds();
    first.generate("Setup", "heading");
    expect(second.generate("Setup", "heading")).toBe("setup");
  });
});

describe("uniqueHeadingIds", () => {
  it("returns slugified ids for unique labels", () => {
    const result = uniqueHeadingIds(["Introduction", "Getting Started"]);
    expect(result).toEqual([
      { id: "introduction", label: "Introduction" },
      { id: "getting-started", label: "Getting Started" },
    ]);
  });

  it("appends -1, -2, etc. for duplicate labels", () => {
    const result = uniqueHeadingIds(["Setup", "Setup", "Setup"]);
    expect(result).toEqual([
      { id: "setup", label: "Setup" },
      { id: "setup-1", label: "Setup" },
      { id: "setup-2", label: "Setup" },
    ]);
  });

  it("falls back to 'heading' for empty slug", () => {
    const result = uniqueHeadingIds(["!!!"]);
    expect(result).toEqual([{ id: "heading", label: "!!!" }]);
  });

  it("handles mix of unique and duplicate labels", () => {
    const result = uniqueHeadingIds(["Intro", "Setup", "Intro"]);
    expect(result).toEqual([
      { id: "intro", label: "Intro" },
      { id: "setup", label: "Setup" },
      { id: "intro-1", label: "Intro" },
    ]);
  });

  it("handles empty array", () => {
    expect(uniqueHeadingIds([])).toEqual([]);
  });
});
