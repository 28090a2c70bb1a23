import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { isTag, isText } from "domhandler";
import type { AnyNode } from "domhandler";
import { logger } from "../../utils/logger";
import { LOG_MESSAGES, LOG_SOURCES } from "../../constants/log";
import { Line, LineCorpus, Resource, StyleHints } from "../../types/menu.types";
import { SelectorHints } from "../../types/config.types";
import { collapseWhitespace } from "../../utils/text";
import { AdapterContext, StrategyAdapter } from "./adapter.types";
import { toResourceRef } from "./lines";

const REMOVED_SELECTORS = [
  "script",
  "style",
  "noscript",
  "iframe",
  "nav",
  // Page-level chrome only; headers inside sections carry menu titles
  "body > header",
  "body > footer",
  "[role=banner]",
  "form",
  "button",
  "svg",
  "template",
  "[role=navigation]",
  "[hidden]",
  "[aria-hidden=true]"
];

const BLOCK_TAGS = new Set([
  "p", "div", "li", "ul", "ol", "h1", "h2", "h3", "h4", "h5", "h6", "tr", "td", "th",
  "table", "section", "article", "main", "aside", "dd", "dt", "dl", "blockquote", "figcaption"
]);

// Formatting tags that sit inside words and add no separator
const WORD_LEVEL_TAGS = new Set(["b", "strong", "i", "em", "u", "sup", "sub", "small", "mark", "abbr"]);

const BODY_FONT_SIZE = 16;

const HEADING_FONT_SIZES: Record<string, number> = {
  h1: 32,
  h2: 24,
  h3: 18.72,
  h4: 16,
  h5: 13.28,
  h6: 10.72
};

const HAS_CONTENT = /[\p{L}\d]/u;

type WalkStyle = Required<StyleHints>;

class LineCollector {
  readonly lines: Line[] = [];
  private parts: string[] = [];
  private style?: WalkStyle;

  push(text: string, style: WalkStyle): void {
    if (!text.trim()) {
      this.parts.push(text);
      return;
    }
    if (!this.style) {
      this.style = style;
    }
    this.parts.push(text);
  }

  flush(): void {
    const text = collapseWhitespace(this.parts.join(""));
    if (HAS_CONTENT.test(text) && this.style) {
      this.lines.push({ text, style: { ...this.style } });
    }
    this.parts = [];
    this.style = undefined;
  }
}

export class HtmlAdapter implements StrategyAdapter {
  async toLineCorpus(resource: Resource, context: AdapterContext): Promise<LineCorpus> {
    const source = toResourceRef(resource, context.contentType);
    const lines = this.linesFromHtml(resource.bytes.toString("utf8"), context.selectorHints, resource.url);

    logger.info(LOG_SOURCES.HTML, LOG_MESSAGES.CORPUS_BUILT, { url: resource.url, lines: lines.length });

    return { source, lines };
  }

  /**
   * Lines in document order. Selector hints are tried first; when they
   * match nothing the generic visible-text walk is used.
   */
  linesFromHtml(html: string, hints?: SelectorHints, url?: string): Line[] {
    const $ = cheerio.load(html);

    $(REMOVED_SELECTORS.join(", ")).remove();
    if (hints?.exclude && hints.exclude.length > 0) {
      $(hints.exclude.join(", ")).remove();
    }

    if (hints?.item) {
      const hinted = this.linesFromHints($, hints, hints.item);
      if (hinted.length > 0) {
        return hinted;
      }
      logger.warn(LOG_SOURCES.HTML, LOG_MESSAGES.SELECTOR_HINTS_EMPTY, { url, item: hints.item });
    }

    const roots = hints?.container ? $(hints.container).toArray() : [];
    const startNodes = roots.length > 0 ? roots : $("body").toArray();
    const collector = new LineCollector();
    const base: WalkStyle = { fontSize: BODY_FONT_SIZE, bold: false, indentLevel: 0 };

    for (const node of startNodes) {
      this.walk(node, base, collector);
      collector.flush();
    }

    return collector.lines;
  }

  private linesFromHints($: CheerioAPI, hints: SelectorHints, item: string): Line[] {
    const selector = hints.section ? `${hints.section}, ${item}` : item;
    const matches = hints.container ? $(hints.container).find(selector) : $(selector);
    const lines: Line[] = [];
    let section: string | undefined;

    matches.each((_, element) => {
      const $element = $(element);

      if (hints.section && $element.is(hints.section)) {
        section = collapseWhitespace($element.text()) || section;
        if (!hints.name && section) {
          lines.push({ text: section, style: { fontSize: HEADING_FONT_SIZES.h2, bold: true, indentLevel: 0 } });
        }
        return;
      }

      if (!hints.name) {
        const text = collapseWhitespace($element.text());
        if (HAS_CONTENT.test(text)) {
          lines.push({ text });
        }
        return;
      }

      const name = collapseWhitespace($element.find(hints.name).first().text());
      if (!name) {
        return;
      }
      const description = hints.description ? collapseWhitespace($element.find(hints.description).first().text()) : "";
      const price = hints.price
        ? collapseWhitespace(
            $element
              .find(hints.price)
              .toArray()
              .map(node => $(node).text())
              .join(" / ")
          )
        : "";

      lines.push({
        text: name,
        preParsed: {
          name,
          ...(description ? { description } : {}),
          ...(price ? { price } : {}),
          ...(section ? { section } : {})
        }
      });
    });

    return lines;
  }

  private walk(node: AnyNode, style: WalkStyle, collector: LineCollector): void {
    if (isText(node)) {
      collector.push(node.data, style);
      return;
    }
    if (!isTag(node)) {
      return;
    }

    const tag = node.name.toLowerCase();
    if (tag === "br") {
      collector.flush();
      return;
    }

    const block = BLOCK_TAGS.has(tag);
    const separated = !block && !WORD_LEVEL_TAGS.has(tag);
    const childStyle = this.styleFor(tag, style);

    if (block) {
      collector.flush();
    } else if (separated) {
      collector.push(" ", childStyle);
    }
    for (const child of node.children) {
      this.walk(child, childStyle, collector);
    }
    if (block) {
      collector.flush();
    } else if (separated) {
      collector.push(" ", childStyle);
    }
  }

  private styleFor(tag: string, parent: WalkStyle): WalkStyle {
    const headingSize = HEADING_FONT_SIZES[tag];
    if (headingSize !== undefined) {
      return { ...parent, fontSize: headingSize, bold: true };
    }
    if (tag === "strong" || tag === "b") {
      return { ...parent, bold: true };
    }
    if (tag === "ul" || tag === "ol") {
      return { ...parent, indentLevel: parent.indentLevel + 1 };
    }
    return parent;
  }
}
