import { describe, expect, it } from "vitest";
import { renderArticleHtml } from "../src/security/markdown";

describe("renderArticleHtml", () => {
  it("escapes raw script tags while keeping markdown formatting", () => {
    const html = renderArticleHtml("<script>alert('xss')</script> **safe**");

    expect(html).not.toContain("<script");
    expect(html).toContain("<strong>safe</strong>");
  });

  it("does not turn javascript URLs into links", () => {
    const html = renderArticleHtml("[click](javascript:alert(1))");

    expect(html).not.toContain("<a");
  });

  it("marks links as nofollow", () => {
    expect(renderArticleHtml("[docs](https://example.com)")).toBe(
      '<p><a href="https://example.com" rel="nofollow noopener noreferrer">docs</a></p>'
    );
  });

  it("shifts authored headings below the page title", () => {
    expect(renderArticleHtml("# Title")).toBe("<h2>Title</h2>");
    expect(renderArticleHtml("###### Deep")).toBe("<h4>Deep</h4>");
  });

  it("never emits inline images or event handlers", () => {
    const html = renderArticleHtml("<img src=x onerror=alert(1)> ![pic](https://example.com/a.png)");

    expect(html).not.toMatch(/<img/i);
    expect(html).not.toMatch(/<[^>]+\son(?:error|load)\s*=/i);
  });
});
