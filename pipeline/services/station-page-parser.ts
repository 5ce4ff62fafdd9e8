import { load } from "cheerio";
import { foldFullWidth, normalizeWhitespace } from "../../packages/shared/src/text-utils.js";
import type { RawObservation } from "../../packages/shared/src/contracts.js";
import { ExtractionError } from "../utils/pipeline-errors.js";

/** Address placeholder used when the page has no address container. */
export const UNKNOWN_ADDRESS = "不明";

export const DEFAULT_STATION_IMAGE_PATTERN = /DR-\d+-l\.jpg/;

const OBSERVED_AT_PATTERN = /観測日時:\s*(\d{4}-\d{2}-\d{2})\s+(\d{2}:\d{2})/;
const CAPTURED_AT_PATTERN = /撮影日時:\s*(\d{1,2})\/(\d{1,2})\s+(\d{1,2}:\d{2})/;

const ADDRESS_SELECTOR = "div.style3";

type TableField =
  | "locationName"
  | "cumulativeRainfall"
  | "temperature"
  | "windSpeed"
  | "roadTemperature"
  | "roadCondition";

/** First-column labels of the two-column rows, matched exactly. A later row overwrites an earlier one. */
const TABLE_LABELS = new Map<string, TableField>([
  ["観測地点", "locationName"],
  ["累加雨量", "cumulativeRainfall"],
  ["気温", "temperature"],
  ["風速", "windSpeed"],
  ["路面温度", "roadTemperature"],
  ["路面状況", "roadCondition"]
]);

export interface StationPageParseOptions {
  imagePattern?: RegExp;
  /** Supplies the year for the capture timestamp when no observed timestamp exists. */
  now?: () => Date;
}

const pad = (value: string): string => value.padStart(2, "0");

export const parseObservedAt = (pageText: string): string | null => {
  const match = OBSERVED_AT_PATTERN.exec(foldFullWidth(pageText));
  if (!match) {
    return null;
  }

  return `${match[1]} ${match[2]}`;
};

/**
 * The page prints the capture time as `MM/DD HH:MM`; the year comes from the
 * observed timestamp, or from `fallbackYear` when that is unavailable.
 */
export const parseCapturedAt = (
  pageText: string,
  observedAt: string | null,
  fallbackYear: number
): string | null => {
  const match = CAPTURED_AT_PATTERN.exec(foldFullWidth(pageText));
  if (!match) {
    return null;
  }

  const [, month, day, time] = match;
  const year = observedAt ? observedAt.slice(0, 4) : String(fallbackYear);
  const [hours, minutes] = time.split(":");

  return `${year}-${pad(month)}-${pad(day)} ${pad(hours)}:${minutes}`;
};

export const parseStationPage = (
  html: string,
  pageUrl: string,
  options: StationPageParseOptions = {}
): RawObservation => {
  const $ = load(html);
  const imagePattern = options.imagePattern ?? DEFAULT_STATION_IMAGE_PATTERN;
  const now = options.now ?? (() => new Date());

  const pageText = $.root().text();

  const observedAt = parseObservedAt(pageText);
  if (!observedAt) {
    throw new ExtractionError("observedAt");
  }

  const capturedAt = parseCapturedAt(pageText, observedAt, now().getFullYear());
  if (!capturedAt) {
    throw new ExtractionError("capturedAt");
  }

  const addressContainer = $(ADDRESS_SELECTOR).first();
  const locationAddress = addressContainer.length
    ? normalizeWhitespace(addressContainer.text()) || UNKNOWN_ADDRESS
    : UNKNOWN_ADDRESS;

  const tableValues = new Map<TableField, string>();

  $("table tr").each((_, row) => {
    const cells = $(row).children("td");
    if (cells.length !== 2) {
      return;
    }

    const label = normalizeWhitespace(cells.eq(0).text());
    const field = TABLE_LABELS.get(label);
    if (!field) {
      return;
    }

    tableValues.set(field, normalizeWhitespace(cells.eq(1).text()));
  });

  const locationName = tableValues.get("locationName");
  if (!locationName) {
    throw new ExtractionError("locationName");
  }

  const imageSource = $("img[src]")
    .toArray()
    .map((image) => $(image).attr("src") ?? "")
    .find((src) => imagePattern.test(src));

  if (!imageSource) {
    throw new ExtractionError("imageUrl", `no <img> matching ${imagePattern}`);
  }

  return {
    locationName,
    locationAddress,
    observedAt,
    capturedAt,
    cumulativeRainfall: tableValues.get("cumulativeRainfall") ?? null,
    temperature: tableValues.get("temperature") ?? null,
    windSpeed: tableValues.get("windSpeed") ?? null,
    roadTemperature: tableValues.get("roadTemperature") ?? null,
    roadCondition: tableValues.get("roadCondition") ?? null,
    imageUrl: new URL(imageSource, pageUrl).toString()
  };
};
