import { describe, expect, it } from "vitest";
import {
  deriveImageFilename,
  imageNameFromUrl
} from "../../pipeline/services/image-filename.js";
import { ValidationError } from "../../pipeline/utils/pipeline-errors.js";
import { captureError } from "../test-utils.js";

describe("deriveImageFilename", () => {
  it("prefixes the original name with the observation minute", () => {
    expect(deriveImageFilename("2026-02-16 10:30", "DR-74125-l.jpg")).toBe(
      "20260216_1030_DR-74125-l.jpg"
    );
  });

  it("replaces dots inside the base name and keeps the extension", () => {
    expect(deriveImageFilename("2026-02-16 10:30", "cam.front.v2.png")).toBe(
      "20260216_1030_cam_front_v2.png"
    );
  });

  it("defaults the extension when the name has none", () => {
    expect(deriveImageFilename("2026-02-16 10:30", "snapshot")).toBe(
      "20260216_1030_snapshot.jpg"
    );
  });

  it("returns the same name for the same inputs", () => {
    const first = deriveImageFilename("2026-01-05 07:05", "DR-74125-l.jpg");
    const second = deriveImageFilename("2026-01-05 07:05", "DR-74125-l.jpg");

    expect(first).toBe("20260105_0705_DR-74125-l.jpg");
    expect(second).toBe(first);
  });

  it("returns different names for different observation minutes", () => {
    expect(deriveImageFilename("2026-02-16 10:30", "DR-74125-l.jpg")).not.toBe(
      deriveImageFilename("2026-02-16 10:45", "DR-74125-l.jpg")
    );
  });

  it("rejects a malformed observation timestamp", () => {
    const error = captureError(() => deriveImageFilename("2026/02/16 10:30", "a.jpg"));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ field: "observedAt" });
  });
});

describe("imageNameFromUrl", () => {
  it("takes the last path segment", () => {
    expect(imageNameFromUrl("http://station.test/sendai/html/image/DR-74125-l.jpg")).toBe(
      "DR-74125-l.jpg"
    );
  });

  it("ignores query strings and fragments", () => {
    expect(imageNameFromUrl("http://station.test/image/DR-74125-l.jpg?t=1700#x")).toBe(
      "DR-74125-l.jpg"
    );
  });

  it("decodes escaped characters", () => {
    expect(imageNameFromUrl("http://station.test/image/%E4%BD%9C%E4%B8%A6.jpg")).toBe(
      "作並.jpg"
    );
  });

  it("falls back to a default name for a directory URL", () => {
    expect(imageNameFromUrl("http://station.test/image/")).toBe("image.jpg");
  });
});
