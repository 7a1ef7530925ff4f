import MarkdownIt from "markdown-it";
import sanitizeHtml from "sanitize-html";

const markdown = new MarkdownIt({
  html: false,
  linkify: true,
  typographer: false,
  breaks: true
});

const ARTICLE_TAGS = [
  "p",
  "br",
  "hr",
  "strong",
  "em",
  "ul",
  "ol",
  "li",
  "a",
  "code",
  "pre",
  "blockquote",
  "h2",
  "h3",
  "h4"
];

// Article pages own the h1; authored headings are shifted down one level.
const HEADING_SHIFT: Record<string, string> = {
  h1: "h2",
  h2: "h3",
  h3: "h4",
  h4: "h4",
  h5: "h4",
  h6: "h4"
};

export function renderArticleHtml(body: string): string {
  const rendered = markdown.render(body);

  const shiftHeading: sanitizeHtml.Transformer = (tagName, attribs) => ({
    tagName: HEADING_SHIFT[tagName] ?? tagName,
    attribs
  });

  return sanitizeHtml(rendered, {
    allowedTags: ARTICLE_TAGS,
    allowedAttributes: {
      a: ["href", "title", "rel"],
      code: ["class"]
    },
    allowedSchemes: ["http", "https", "mailto"],
    transformTags: {
      h1: shiftHeading,
      h2: shiftHeading,
      h3: shiftHeading,
      h4: shiftHeading,
      h5: shiftHeading,
      h6: shiftHeading,
      a: (tagName, attribs) => ({
        tagName,
        attribs: {
          href: attribs.href ?? "#",
          ...(attribs.title ? { title: attribs.title } : {}),
          rel: "nofollow noopener noreferrer"
        }
      })
    }
  }).trim();
}
