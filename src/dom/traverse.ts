import * as cheerio from "cheerio";
import type { AnyNode, Element } from "domhandler";
import { normalizeWhitespace } from "../utils/text";

export type ElementMatcher = string | ((element: Element) => boolean);

export function textFromElement(element: cheerio.Cheerio<AnyNode>): string {
  return normalizeWhitespace(element.text());
}

export class DocumentIndex {
  private readonly elements: Element[];
  private readonly positions = new Map<Element, number>();

  constructor(private readonly $: cheerio.CheerioAPI) {
    this.elements = $<Element, "*">("*").toArray();
    this.elements.forEach((element, index) => this.positions.set(element, index));
  }

  position(element: Element): number {
    return this.positions.get(element) ?? -1;
  }

  // Document order, descendants of `from` included, like a forward scan of the markup.
  findNext(from: Element, matcher: ElementMatcher): Element | null {
    const start = this.position(from);
    if (start < 0) return null;
    const matches =
      typeof matcher === "string" ? (element: Element) => this.$(element).is(matcher) : matcher;
    for (let i = start + 1; i < this.elements.length; i++) {
      const candidate = this.elements[i];
      if (matches(candidate)) return candidate;
    }
    return null;
  }
}
