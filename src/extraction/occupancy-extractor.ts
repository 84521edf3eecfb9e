import { Inject, Injectable } from "@nestjs/common";
import * as cheerio from "cheerio";
import { RawPage } from "../external-apis/pool-page/pool-page.types";
import { ExtractedReading } from "./extraction.types";
import { decodePage } from "./page-decoding";
import { Result, ok, err } from "../common/types/result.type";
import { ExtractError } from "../common/types/ingestion-error.type";
import {
  EXTRACTION_CONFIG,
  ExtractionConfig,
} from "../config/polling.config";
import { toSecondPrecision } from "../samples/sample.types";

// How far up from the label element we look for the number
const MAX_WIDEN_LEVELS = 3;
// Occupancy may exceed the posted capacity a little, never by this much
const CAPACITY_OVERFLOW_FACTOR = 1.5;
const MAX_STATUS_LENGTH = 64;

// "37" or "1 234": a grouping separator is one space, NBSP or thin space
// followed by exactly three digits, so "37\n8:00" stays 37
const NUMBER = "\\d{1,3}(?:[ \\u00a0\\u202f]\\d{3})+(?!\\d)|\\d+";
const NUMBER_TOKEN = new RegExp(NUMBER);
const CAPACITY_SUFFIX = new RegExp(`^\\s*\\/\\s*(${NUMBER})`);

// Block boundaries get a line break so adjacent cells never run together
const BLOCK_ELEMENTS =
  "address, article, aside, blockquote, br, dd, div, dl, dt, footer, h1, h2, " +
  "h3, h4, h5, h6, header, hr, li, main, nav, ol, p, section, table, tbody, " +
  "td, tfoot, th, thead, tr, ul";

/**
 * Extracts the occupancy reading from the pool page.
 *
 * Structural locator: the innermost element whose text contains the occupancy
 * label. The reading is the text following the label, either "37" or "37/80".
 * Any drift in the page (label gone, no number, implausible value) yields an
 * ExtractError; this function never throws and does no I/O.
 */
export function extractOccupancy(
  page: RawPage,
  config: ExtractionConfig,
): Result<ExtractedReading, ExtractError> {
  const html = decodePage(page);
  const label = normalizeText(config.occupancyLabel).toUpperCase();

  const notFound: ExtractError = {
    family: "ExtractError",
    kind: "StructureNotFound",
    locator: label,
  };
  if (html.trim() === "") {
    return err(notFound);
  }

  const $ = cheerio.load(html);
  $(BLOCK_ELEMENTS).before("\n").after("\n");

  const tail = textAfterLabel($, label, MAX_WIDEN_LEVELS, (text) =>
    /\d/.test(text),
  );
  if (tail === null) {
    return err(notFound);
  }

  const reading = parseReading(tail, config.maxOccupancy);
  if (!reading.ok) {
    return reading;
  }

  let rawStatus: string | null = null;
  if (config.statusLabel) {
    const statusTail = textAfterLabel(
      $,
      normalizeText(config.statusLabel).toUpperCase(),
      1,
      (text) => cleanStatus(text) !== null,
    );
    rawStatus = statusTail === null ? null : cleanStatus(statusTail);
  }

  return ok({
    timestamp: toSecondPrecision(page.fetchedAt),
    occupancy: reading.value.occupancy,
    capacity: reading.value.capacity,
    rawStatus,
  });
}

/**
 * Injectable wrapper so the pipeline receives its configuration through DI.
 */
@Injectable()
export class OccupancyExtractor {
  constructor(
    @Inject(EXTRACTION_CONFIG) private readonly config: ExtractionConfig,
  ) {}

  extract(page: RawPage): Result<ExtractedReading, ExtractError> {
    return extractOccupancy(page, this.config);
  }
}

export function normalizeText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

// Matches the label with any run of whitespace between its words
function labelPattern(label: string): RegExp {
  const words = label
    .split(" ")
    .map((word) => word.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"));
  return new RegExp(words.join("\\s+"), "iu");
}

/**
 * Text after `label` within an innermost element holding it. Until `accept`
 * approves that text, the search widens to enclosing elements (at most
 * `maxWiden` levels) so "<b>label</b> <b>37/80</b>" resolves as well.
 *
 * All holders are tried at each level before any is widened further, so a
 * menu link repeating the label does not shadow the content. When nothing is
 * accepted, the first holder's widest tail is returned; null when no element
 * contains the label.
 */
function textAfterLabel(
  $: cheerio.CheerioAPI,
  label: string,
  maxWiden: number,
  accept: (tail: string) => boolean,
): string | null {
  const pattern = labelPattern(label);
  const holders = $("body, body *")
    .toArray()
    .filter(
      (el) =>
        pattern.test($(el).text()) &&
        !$(el)
          .children()
          .toArray()
          .some((child) => pattern.test($(child).text())),
    );
  if (holders.length === 0) {
    return null;
  }

  let scopes = holders.map((holder) => $(holder));
  let fallback = "";
  for (let level = 0; level <= maxWiden; level++) {
    const tails = scopes.map((scope) => tailAfter(scope.text(), pattern));
    const accepted = tails.find(accept);
    if (accepted !== undefined) {
      return accepted;
    }
    fallback = tails[0];
    scopes = scopes.map((scope) =>
      scope.parent().length > 0 ? scope.parent() : scope,
    );
  }
  return fallback;
}

function tailAfter(text: string, pattern: RegExp): string {
  const match = pattern.exec(text);
  return match ? text.slice(match.index + match[0].length) : "";
}

function parseReading(
  tail: string,
  maxOccupancy: number,
): Result<{ occupancy: number; capacity: number | null }, ExtractError> {
  const match = NUMBER_TOKEN.exec(tail);
  if (!match) {
    return err({
      family: "ExtractError",
      kind: "NonNumericValue",
      text: normalizeText(tail).slice(0, 40),
    });
  }

  const occupancy = toInteger(match[0]);
  if (hasMinusSign(tail, match.index)) {
    return err({
      family: "ExtractError",
      kind: "OutOfRange",
      value: -occupancy,
      min: 0,
      max: maxOccupancy,
    });
  }

  const suffix = CAPACITY_SUFFIX.exec(
    tail.slice(match.index + match[0].length),
  );
  const capacity = suffix ? toInteger(suffix[1]) : null;

  if (capacity !== null && capacity > maxOccupancy) {
    return err({
      family: "ExtractError",
      kind: "OutOfRange",
      value: capacity,
      min: 0,
      max: maxOccupancy,
    });
  }

  const bound =
    capacity !== null && capacity > 0
      ? Math.min(maxOccupancy, Math.floor(capacity * CAPACITY_OVERFLOW_FACTOR))
      : maxOccupancy;
  if (occupancy > bound) {
    return err({
      family: "ExtractError",
      kind: "OutOfRange",
      value: occupancy,
      min: 0,
      max: bound,
    });
  }

  return ok({ occupancy, capacity });
}

// "-5" counts as negative, "BASENIE - 5" does not
function hasMinusSign(text: string, digitIndex: number): boolean {
  const sign = text.charAt(digitIndex - 1);
  return sign === "-" || sign === "\u2212";
}

// Strips the grouping separators: "1 234" -> 1234
function toInteger(token: string): number {
  return parseInt(token.replace(/\D/g, ""), 10);
}

function cleanStatus(tail: string): string | null {
  const status = normalizeText(tail).replace(/^[\s:\-–]+/, "");
  return status === "" ? null : status.slice(0, MAX_STATUS_LENGTH);
}
