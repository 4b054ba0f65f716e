export { ContentExtractor, extractCodeBlock, extractJsonField, extractSection, MIN_CONTENT_LENGTH } from './base.js';
export { CssExtractor } from './css.js';
export { HtmlExtractor } from './html.js';
export { JsExtractor } from './js.js';
export { JsonExtractor } from './json.js';
export { MarkdownExtractor } from './markdown.js';
