import { formatCompactStamp, parseMinuteTimestamp } from "../utils/minute-timestamp.js";
import { ValidationError } from "../utils/pipeline-errors.js";

const DEFAULT_IMAGE_NAME = "image.jpg";
const DEFAULT_IMAGE_EXTENSION = "jpg";

/** Last path segment of an image URL, ignoring query and fragment. */
export const imageNameFromUrl = (imageUrl: string): string => {
  let pathname: string;
  try {
    pathname = new URL(imageUrl).pathname;
  } catch {
    pathname = imageUrl.split(/[?#]/)[0] ?? "";
  }

  const segment = pathname.split("/").pop() ?? "";
  if (!segment) {
    return DEFAULT_IMAGE_NAME;
  }

  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
};

/**
 * `("2026-02-16 10:30", "DR-74125-l.jpg")` → `"20260216_1030_DR-74125-l.jpg"`.
 *
 * Dots inside the base name become underscores so the only dot left is the
 * one before the extension. Unique for as long as `observedAt` is.
 */
export const deriveImageFilename = (observedAt: string, originalName: string): string => {
  const timestamp = parseMinuteTimestamp(observedAt);
  if (!timestamp) {
    throw new ValidationError("observedAt", "expected YYYY-MM-DD HH:MM", {
      value: observedAt
    });
  }

  const name = originalName.trim() || DEFAULT_IMAGE_NAME;
  const extensionIndex = name.lastIndexOf(".");
  const hasExtension = extensionIndex > 0 && extensionIndex < name.length - 1;

  const baseName = (hasExtension ? name.slice(0, extensionIndex) : name).replace(/\./g, "_");
  const extension = hasExtension ? name.slice(extensionIndex + 1) : DEFAULT_IMAGE_EXTENSION;

  return `${formatCompactStamp(timestamp)}_${baseName}.${extension}`;
};
