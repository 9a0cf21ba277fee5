import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import { DocumentIndex, textFromElement } from "../dom/traverse";
import { ImageDescriptor, UNKNOWN } from "../types/caseRecord";
import { resolveHref } from "../utils/url";

export const THUMBNAIL_SELECTOR = "div.col-md-13.thumbnail";
export const IMAGE_ANCHOR_SELECTOR = "a.fancybox[href]";
export const PROVISIONAL_DIAGNOSIS_LABEL = "Provisional diagnosis:";
export const MANAGEMENT_LABEL = "Management:";
export const SWEDE_SCORE_LABEL = "Swede score:";
export const SCORE_HIGHLIGHT_COLOR = "#ffab19";

const AGE_LABEL_POSITION = 1;
const HPV_LABEL_POSITION = 2;

export interface DetailContext {
  $: cheerio.CheerioAPI;
  index: DocumentIndex;
  container: cheerio.Cheerio<Element>;
  baseUrl: string;
}

export type DetailRule<T> = (ctx: DetailContext) => T;

function boldTextAfter(ctx: DetailContext, label: Element): string | null {
  const bold = ctx.index.findNext(label, "b");
  return bold ? textFromElement(ctx.$(bold)) : null;
}

// Demographic labels sit above the gallery; stage labels below it must not shift their positions.
function headerLabels(ctx: DetailContext): Element[] {
  const labels = ctx.container.find("font").toArray();
  const firstThumbnail = ctx.container.find(THUMBNAIL_SELECTOR).get(0);
  if (!firstThumbnail) return labels;
  const galleryStart = ctx.index.position(firstThumbnail);
  return labels.filter((label) => ctx.index.position(label) < galleryStart);
}

function positionalLabelValue(ctx: DetailContext, position: number): string {
  const labels = headerLabels(ctx);
  if (position >= labels.length) return UNKNOWN;
  return boldTextAfter(ctx, labels[position]) ?? UNKNOWN;
}

function holdsLabel(ctx: DetailContext, element: Element, labelText: string): boolean {
  return ctx.$(element).text().includes(labelText);
}

// Innermost match: a font wrapping a whole table must not stand in for the label inside it.
function findLabel(ctx: DetailContext, labelText: string): Element | null {
  const match = ctx.container
    .find("font")
    .toArray()
    .find(
      (element) =>
        holdsLabel(ctx, element, labelText) &&
        !ctx
          .$(element)
          .find("font")
          .toArray()
          .some((inner) => holdsLabel(ctx, inner, labelText))
    );
  return match ?? null;
}

function labelledCellValue(ctx: DetailContext, labelText: string): string | null {
  const label = findLabel(ctx, labelText);
  if (!label) return null;
  const cell = ctx.index.findNext(label, "td");
  if (!cell) return null;
  const $cell = ctx.$(cell);
  const bold = $cell.find("b").first();
  return textFromElement(bold.length ? bold : $cell);
}

function isScoreHighlight(element: Element): boolean {
  return element.tagName === "font" && element.attribs.color?.trim().toLowerCase() === SCORE_HIGHLIGHT_COLOR;
}

export const extractAge: DetailRule<string> = (ctx) => positionalLabelValue(ctx, AGE_LABEL_POSITION);

export const extractHpvStatus: DetailRule<string> = (ctx) =>
  positionalLabelValue(ctx, HPV_LABEL_POSITION);

export const extractProvisionalDiagnosis: DetailRule<string | null> = (ctx) =>
  labelledCellValue(ctx, PROVISIONAL_DIAGNOSIS_LABEL);

export const extractManagement: DetailRule<string | null> = (ctx) =>
  labelledCellValue(ctx, MANAGEMENT_LABEL);

export const extractSwedeScore: DetailRule<string | null> = (ctx) => {
  const label = findLabel(ctx, SWEDE_SCORE_LABEL);
  if (!label) return null;
  const highlight = ctx.index.findNext(label, isScoreHighlight);
  return highlight ? textFromElement(ctx.$(highlight)) : null;
};

export const extractImages: DetailRule<ImageDescriptor[]> = (ctx) => {
  const images: ImageDescriptor[] = [];
  for (const thumbnail of ctx.container.find(THUMBNAIL_SELECTOR).toArray()) {
    const anchor = ctx.$(thumbnail).find(IMAGE_ANCHOR_SELECTOR).first();
    const url = resolveHref(anchor.attr("href"), ctx.baseUrl);
    if (!url) continue;

    const stageLabel = ctx.index.findNext(thumbnail, "font:has(b)");
    const stage = stageLabel ? textFromElement(ctx.$(stageLabel).find("b").first()) : "";

    images.push({
      url,
      stage: stage || UNKNOWN,
      description: anchor.attr("title")?.trim() ?? "",
      order: images.length + 1
    });
  }
  return images;
};
