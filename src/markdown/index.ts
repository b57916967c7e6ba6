export { parseMarkdown, escapeMarkdown, type MarkdownSpan } from "./spans.js";
