/**
 * Rejection body serialization.
 */

import { ErrorResponseContentType } from "./types.js";

const XML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&#34;",
  "'": "&#39;",
  "\t": "&#x9;",
  "\n": "&#xA;",
  "\r": "&#xD;",
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"'\t\n\r]/g, (ch) => XML_ESCAPES[ch] ?? ch);
}

/**
 * Encode a rejection message for the configured content type.
 * Every body ends with a newline.
 */
export function formatErrorBody(
  message: string,
  contentType: ErrorResponseContentType,
): string {
  switch (contentType) {
    case ErrorResponseContentType.JSON:
      return `${JSON.stringify(message)}\n`;
    case ErrorResponseContentType.XML:
      return `<string>${escapeXml(message)}</string>\n`;
    case ErrorResponseContentType.Plain:
      return `${message}\n`;
  }
}

export function contentTypeHeader(contentType: ErrorResponseContentType): string {
  return `${contentType}; charset=utf-8`;
}
