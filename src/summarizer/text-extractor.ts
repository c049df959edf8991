import { parse, HTMLElement, TextNode, type Node } from "node-html-parser";

const SKIPPED_TAGS = new Set(["script", "style", "noscript", "template", "svg", "iframe"]);

const BLOCK_TAGS = new Set([
  "address", "article", "aside", "blockquote", "br", "dd", "div", "dl", "dt",
  "figcaption", "figure", "footer", "form", "h1", "h2", "h3", "h4", "h5", "h6",
  "header", "hr", "li", "main", "nav", "ol", "p", "pre", "section", "table",
  "td", "th", "title", "tr", "ul",
]);

const BLOCK_END = Symbol("block-end");

// Iterative walk: article pages can nest deeper than the call stack allows.
function collectText(root: Node, out: string[]): void {
  const pending: (Node | typeof BLOCK_END)[] = [root];

  while (pending.length > 0) {
    const node = pending.pop();
    if (node === undefined) break;
    if (node === BLOCK_END) {
      out.push("\n");
      continue;
    }
    if (node instanceof TextNode) {
      // Source line breaks inside a block are layout, not content.
      out.push(node.text.replace(/\s+/g, " "));
      continue;
    }
    if (!(node instanceof HTMLElement)) continue;

    const tag = node.rawTagName ? node.rawTagName.toLowerCase() : "";
    if (SKIPPED_TAGS.has(tag)) continue;

    if (BLOCK_TAGS.has(tag)) {
      out.push("\n");
      pending.push(BLOCK_END);
    }
    for (let i = node.childNodes.length - 1; i >= 0; i--) {
      pending.push(node.childNodes[i]);
    }
  }
}

/**
 * Visible text of a whole HTML document, one line per block element.
 * Not a readability extractor: navigation and footers are kept.
 */
export function extractText(html: string): string {
  // The parser keeps declarations such as <!DOCTYPE> as text nodes.
  const root = parse(html.replace(/<![a-z][^>]*>/gi, ""));
  const out: string[] = [];
  collectText(root, out);

  return out
    .join("")
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}
