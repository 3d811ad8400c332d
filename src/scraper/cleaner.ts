import { load } from "cheerio";

export const NO_TITLE = "No title found";

export interface CleanedPage {
  title: string;
  cleanedText: string;
}

// Elements that start a new line in the extracted text.
const BLOCK_ELEMENTS = [
  "address",
  "article",
  "aside",
  "blockquote",
  "dd",
  "div",
  "dl",
  "dt",
  "figcaption",
  "figure",
  "footer",
  "form",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "header",
  "hr",
  "li",
  "main",
  "nav",
  "ol",
  "p",
  "pre",
  "section",
  "table",
  "td",
  "th",
  "tr",
  "ul",
].join(",");

/**
 * Entities in the markup are decoded, so cleaning is only stable on plain text:
 * a second pass over text that still reads like an entity (`&amp;`) decodes it again.
 */
export function cleanHtml(html: string, elementsToRemove: Iterable<string>, fallbackTitle?: string): CleanedPage {
  const $ = load(html);

  const title = $("title").first().text().trim() || fallbackTitle?.trim() || NO_TITLE;

  const selector = Array.from(elementsToRemove).join(",");
  if (selector) {
    $(selector).remove();
  }

  $("br").replaceWith("\n");
  $("body")
    .find(BLOCK_ELEMENTS)
    .each((_, element) => {
      $(element).before("\n").after("\n");
    });

  return { title, cleanedText: normalizeText($("body").text()) };
}

export function normalizeText(text: string): string {
  return text
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter(Boolean)
    .join("\n");
}
