import { describe, expect, it } from "vitest";
import {
  parseCapturedAt,
  parseObservedAt,
  parseStationPage,
  UNKNOWN_ADDRESS
} from "../../pipeline/services/station-page-parser.js";
import { ExtractionError } from "../../pipeline/utils/pipeline-errors.js";
import { captureError, readFixture, STATION_IMAGE_URL, STATION_PAGE_URL } from "../test-utils.js";

const buildPage = (body: string): string => `<html><body>${body}</body></html>`;

const HEADER = `
  <p>観測日時：2026-02-16 10:30</p>
  <p>撮影日時：02/16 10:32</p>
`;

const NAME_ROW = "<table><tr><td>観測地点</td><td>作並宿</td></tr></table>";
const IMAGE = '<img src="image/DR-74125-l.jpg">';

describe("parseStationPage", () => {
  it("extracts every labeled field from the station page", () => {
    const raw = parseStationPage(readFixture("station-page.html"), STATION_PAGE_URL);

    expect(raw).toEqual({
      locationName: "作並宿（チェーン着脱所）",
      locationAddress: "宮城県仙台市青葉区作並字神前西",
      observedAt: "2026-02-16 10:30",
      capturedAt: "2026-02-16 10:32",
      cumulativeRainfall: "0mm",
      temperature: "4.7℃",
      windSpeed: "1.9m/s",
      roadTemperature: "8.0℃",
      roadCondition: "----",
      imageUrl: STATION_IMAGE_URL
    });
  });

  it("falls back to the unknown-address placeholder", () => {
    const raw = parseStationPage(buildPage(HEADER + NAME_ROW + IMAGE), STATION_PAGE_URL);

    expect(raw.locationAddress).toBe(UNKNOWN_ADDRESS);
  });

  it("leaves measurements without a row as null", () => {
    const raw = parseStationPage(
      buildPage(
        `${HEADER}<table><tr><td>観測地点</td><td>作並宿</td></tr><tr><td>気温</td><td>-3.2℃</td></tr></table>${IMAGE}`
      ),
      STATION_PAGE_URL
    );

    expect(raw).toMatchObject({
      temperature: "-3.2℃",
      cumulativeRainfall: null,
      windSpeed: null,
      roadTemperature: null,
      roadCondition: null
    });
  });

  it("ignores rows that do not have exactly two cells", () => {
    const raw = parseStationPage(
      buildPage(
        `${HEADER}<table>
          <tr><td>気温</td><td>9.9℃</td><td>extra</td></tr>
          <tr><td>観測地点</td><td>作並宿</td></tr>
          <tr><td>気温</td><td>1.0℃</td></tr>
        </table>${IMAGE}`
      ),
      STATION_PAGE_URL
    );

    expect(raw.temperature).toBe("1.0℃");
  });

  it("matches labels exactly, not by prefix", () => {
    const raw = parseStationPage(
      buildPage(
        `${HEADER}<table>
          <tr><td>観測地点</td><td>作並宿</td></tr>
          <tr><td>気温（最高）</td><td>12.0℃</td></tr>
        </table>${IMAGE}`
      ),
      STATION_PAGE_URL
    );

    expect(raw.temperature).toBeNull();
  });

  it("keeps absolute image references as they are", () => {
    const raw = parseStationPage(
      buildPage(`${HEADER}${NAME_ROW}<img src="https://cdn.test/cams/DR-74125-l.jpg">`),
      STATION_PAGE_URL
    );

    expect(raw.imageUrl).toBe("https://cdn.test/cams/DR-74125-l.jpg");
  });

  it("uses a custom image pattern when given", () => {
    const raw = parseStationPage(
      buildPage(`${HEADER}${NAME_ROW}<img src="cam/ST-9-large.png">`),
      STATION_PAGE_URL,
      { imagePattern: /ST-\d+-large\.png/ }
    );

    expect(raw.imageUrl).toBe("http://station.test/sendai/html/cam/ST-9-large.png");
  });

  it.each([
    ["observedAt", buildPage(`<p>撮影日時：02/16 10:32</p>${NAME_ROW}${IMAGE}`)],
    ["capturedAt", buildPage(`<p>観測日時：2026-02-16 10:30</p>${NAME_ROW}${IMAGE}`)],
    ["locationName", buildPage(`${HEADER}<table><tr><td>気温</td><td>1℃</td></tr></table>${IMAGE}`)],
    ["imageUrl", buildPage(`${HEADER}${NAME_ROW}<img src="image/DR-74125-s.jpg">`)]
  ])("fails with ExtractionError when %s is missing", (field, html) => {
    const error = captureError(() => parseStationPage(html, STATION_PAGE_URL));

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({ field });
  });

  it("treats an empty location name cell as missing", () => {
    const error = captureError(() =>
      parseStationPage(
        buildPage(`${HEADER}<table><tr><td>観測地点</td><td>  </td></tr></table>${IMAGE}`),
        STATION_PAGE_URL
      )
    );

    expect(error).toMatchObject({ field: "locationName" });
  });

  it("keeps the last row when a label repeats across tables", () => {
    const raw = parseStationPage(
      buildPage(
        HEADER +
          NAME_ROW +
          "<table><tr><td>気温</td><td>----</td></tr></table>" +
          "<table><tr><td>気温</td><td>4.7℃</td></tr></table>" +
          IMAGE
      ),
      STATION_PAGE_URL
    );

    expect(raw.temperature).toBe("4.7℃");
  });
});

describe("parseObservedAt", () => {
  it("accepts both full-width and ASCII colons", () => {
    expect(parseObservedAt("観測日時：2026-02-16 10:30")).toBe("2026-02-16 10:30");
    expect(parseObservedAt("観測日時: 2026-02-16  10:30")).toBe("2026-02-16 10:30");
  });

  it("takes the first occurrence", () => {
    expect(parseObservedAt("観測日時：2026-02-16 10:30 観測日時：2026-02-16 10:45")).toBe(
      "2026-02-16 10:30"
    );
  });

  it("returns null without the label", () => {
    expect(parseObservedAt("2026-02-16 10:30")).toBeNull();
  });
});

describe("parseCapturedAt", () => {
  it("takes the year from the observed timestamp", () => {
    expect(parseCapturedAt("撮影日時：12/31 23:58", "2025-12-31 23:50", 2031)).toBe(
      "2025-12-31 23:58"
    );
  });

  it("falls back to the supplied year without an observed timestamp", () => {
    expect(parseCapturedAt("撮影日時：02/16 10:32", null, 2031)).toBe("2031-02-16 10:32");
  });

  it("pads single-digit month, day and hour", () => {
    expect(parseCapturedAt("撮影日時：2/6 9:05", "2026-02-06 09:00", 2031)).toBe(
      "2026-02-06 09:05"
    );
  });
});
