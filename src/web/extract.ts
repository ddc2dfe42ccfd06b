// pattern: Functional Core

import { Readability } from "@mozilla/readability";
import { parseHTML } from "linkedom";
import type { ExtractionMode } from "./types.ts";

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const DOCUMENT_NODE = 9;
const DOCUMENT_FRAGMENT_NODE = 11;

// Text under these elements never renders.
const HIDDEN_ELEMENTS = new Set(["SCRIPT", "STYLE", "NOSCRIPT", "TEMPLATE"]);

type TextSource = {
  readonly nodeType: number;
  readonly nodeName: string;
  readonly nodeValue: string | null;
  readonly childNodes: ArrayLike<TextSource>;
};

/**
 * Collect the visible strings of a document in document order: every text node outside
 * script-like elements, trimmed, with empty strings dropped and inner whitespace collapsed.
 */
export function collectVisibleStrings(root: TextSource): Array<string> {
  const strings: Array<string> = [];
  const stack: Array<TextSource> = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (node.nodeType === TEXT_NODE) {
      const text = (node.nodeValue ?? "").replace(/\s+/g, " ").trim();
      if (text) strings.push(text);
      continue;
    }

    if (node.nodeType === ELEMENT_NODE) {
      if (HIDDEN_ELEMENTS.has(node.nodeName.toUpperCase())) continue;
    } else if (node.nodeType !== DOCUMENT_NODE && node.nodeType !== DOCUMENT_FRAGMENT_NODE) {
      // comments, doctypes, processing instructions
      continue;
    }

    const children = Array.from(node.childNodes);
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child) stack.push(child);
    }
  }

  return strings;
}

function extractText(html: string): string {
  const { document } = parseHTML(html);
  return collectVisibleStrings(document).join(" ");
}

function extractArticleText(html: string): string | null {
  try {
    const { document } = parseHTML(html);
    const article = new Readability(document).parse();
    if (!article?.content) return null;
    const text = extractText(`<html><body>${article.content}</body></html>`);
    return text || null;
  } catch (error) {
    console.warn(`readability extraction failed, using full page text: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

export function extractVisibleText(html: string, mode: ExtractionMode = "text"): string {
  switch (mode) {
    case "text":
      return extractText(html);
    case "readability":
      return extractArticleText(html) ?? extractText(html);
  }
}
