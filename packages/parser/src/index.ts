export type { IParser } from "./parser.interface.js";
export { TextParser } from "./text-parser.js";
export { PdfParser } from "./pdf-parser.js";
export { DocxParser, DOCX_MIME_TYPE } from "./docx-parser.js";
export { getParser, isSupportedMimeType, normalizeMimeType } from "./factory.js";
export { sanitizeText } from "./sanitize.js";
