import { describe, expect, it } from "vitest";
import { DEFAULT_ELEMENTS_TO_REMOVE } from "../src/config.js";
import { NO_TITLE, cleanHtml, normalizeText } from "../src/scraper/cleaner.js";

const PAGE = `<!doctype html>
<html>
  <head>
    <title>  Release Notes  </title>
    <style>body { color: red; }</style>
  </head>
  <body>
    <header><h1>Site header</h1></header>
    <nav><a href="/">Home</a><a href="/about">About</a></nav>
    <main>
      <h2>Version 2.0</h2>
      <p>New   <strong>faster</strong> parser.</p>
      <ul><li>First fix</li><li>Second fix</li></ul>
      <!-- hidden note -->
      <script>window.tracking = "secret-payload";</script>
      <form><label>Email</label><input name="email" /></form>
    </main>
    <aside>Related links</aside>
    <footer>Copyright</footer>
  </body>
</html>`;

describe("cleanHtml", () => {
  it("extracts the title and the visible text", () => {
    const result = cleanHtml(PAGE, DEFAULT_ELEMENTS_TO_REMOVE);
    expect(result.title).toBe("Release Notes");
    expect(result.cleanedText).toBe(["Version 2.0", "New faster parser.", "First fix", "Second fix"].join("\n"));
  });

  it("never keeps script contents", () => {
    const result = cleanHtml(
      "<html><body><p>Visible</p><script>var leaked = 'do-not-show';</script></body></html>",
      ["script"],
    );
    expect(result.cleanedText).toBe("Visible");
  });

  it("only removes the requested elements", () => {
    const result = cleanHtml("<body><nav>Menu</nav><p>Body</p></body>", ["footer"]);
    expect(result.cleanedText).toBe("Menu\nBody");
  });

  it("breaks lines at <br>", () => {
    const result = cleanHtml("<body><p>one<br>two</p></body>", []);
    expect(result.cleanedText).toBe("one\ntwo");
  });

  it("falls back to the given title, then a placeholder", () => {
    expect(cleanHtml("<p>No head</p>", [], "https://example.com/page").title).toBe("https://example.com/page");
    expect(cleanHtml("<p>No head</p>", []).title).toBe(NO_TITLE);
  });

  it("returns empty text for empty input", () => {
    expect(cleanHtml("", DEFAULT_ELEMENTS_TO_REMOVE).cleanedText).toBe("");
    expect(cleanHtml("<html><body>   </body></html>", DEFAULT_ELEMENTS_TO_REMOVE).cleanedText).toBe("");
  });

  it("is idempotent on already-cleaned text", () => {
    const once = cleanHtml(PAGE, DEFAULT_ELEMENTS_TO_REMOVE).cleanedText;
    const twice = cleanHtml(once, DEFAULT_ELEMENTS_TO_REMOVE).cleanedText;
    expect(twice).toBe(once);
  });
});

describe("cleanHtml on entity-like text", () => {
  it("decodes one level of entities per pass", () => {
    const once = cleanHtml("<p>Tom &amp;amp; Jerry</p>", []).cleanedText;
    expect(once).toBe("Tom &amp; Jerry");
    expect(cleanHtml(once, []).cleanedText).toBe("Tom & Jerry");
  });
});

describe("normalizeText", () => {
  it("trims lines, collapses spaces and drops blank lines", () => {
    expect(normalizeText("  a \t b  \n\n   \n c  ")).toBe("a b\nc");
  });
});
