import { load } from "cheerio";

const BLOCK_ELEMENTS = "p, div, li, ul, ol, h1, h2, h3, h4, h5, h6, tr, td, th, dt, dd, table, section, article, blockquote, pre";

/** Text of an HTML fragment, tags dropped and `<br>` kept as line breaks. */
export function stripHtml(fragment: string): string {
  const $ = load(fragment, null, false);
  $("br").replaceWith("\n");
  return $.root().text().replace(/[ \t]+\n/g, "\n").trim();
}

/**
 * Readable lines of a wiki page: chrome removed, main content preferred,
 * one non-empty line per block element.
 */
export function extractPageLines(html: string, maxLines: number): string[] {
  const $ = load(html);
  $("script, style, nav, footer, header").remove();

  let main = $("div.mw-parser-output").first();
  if (main.length === 0) main = $("main").first();
  if (main.length === 0) main = $("body").first();
  if (main.length === 0) return [];

  main.find("br").replaceWith("\n");
  main.find(BLOCK_ELEMENTS).each((_, el) => {
    $(el).before("\n").after("\n");
  });

  return main
    .text()
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .slice(0, maxLines);
}
