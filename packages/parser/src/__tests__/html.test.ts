import { describe, expect, it } from "vitest";
import {
  decodeEntities,
  extractHref,
  htmlToLines,
  htmlToText,
  stripTags,
} from "../html.js";

describe("decodeEntities", () => {
  it("decodes named and numeric entities", () => {
    expect(decodeEntities("a &amp; b &lt;c&gt; &#65;&#x42;")).toBe(
      "a & b <c> AB"
    );
  });

  it("leaves unknown entities as written", () => {
    expect(decodeEntities("&bogus; &#0;")).toBe("&bogus; &#0;");
  });

  it("decodes non-breaking spaces to plain spaces", () => {
    expect(decodeEntities("x&nbsp;y")).toBe("x y");
  });
});

describe("stripTags", () => {
  it("removes tags without adding line breaks", () => {
    expect(stripTags('<span class="timestamp"><b>10:23:45</b> </span>text')).toBe(
      "10:23:45 text"
    );
  });

  it("keeps a literal less-than sign", () => {
    expect(stripTags("a < b")).toBe("a < b");
  });
});

describe("extractHref", () => {
  it("reads double, single and unquoted values", () => {
    expect(extractHref(' href="https://ci.example.org/job/a"')).toBe(
      "https://ci.example.org/job/a"
    );
    expect(extractHref(" class=\"x\" href='/job/b'")).toBe("/job/b");
    expect(extractHref(" href=/job/c")).toBe("/job/c");
  });

  it("returns undefined without an href", () => {
    expect(extractHref(' class="model-link"')).toBeUndefined();
  });
});

describe("htmlToText", () => {
  it("turns line breaks and block ends into newlines", () => {
    expect(htmlToText("<pre>a &amp; b<br>c</pre>")).toBe("a & b\nc\n");
  });

  it("renders anchors as their text", () => {
    expect(
      htmlToText(
        '<a href="https://ci.example.org/job/X/">https://ci.example.org/job/X/</a> done'
      )
    ).toBe("https://ci.example.org/job/X/ done");
  });

  it("renders empty anchors as their href", () => {
    expect(htmlToText('see <a href="https://ci.example.org/job/Y/"></a>')).toBe(
      "see https://ci.example.org/job/Y/"
    );
  });

  it("drops scripts, styles, head and comments", () => {
    expect(
      htmlToText(
        "<head><title>t</title></head><style>pre{}</style><script>var a = '<b>';</script>a<!-- hidden -->b"
      )
    ).toBe("ab");
  });

  it("normalizes CRLF line endings", () => {
    expect(htmlToText("a\r\nb\rc")).toBe("a\nb\nc");
  });

  it("passes plain text through", () => {
    expect(htmlToText("Started by user anonymous")).toBe(
      "Started by user anonymous"
    );
  });
});

describe("htmlToLines", () => {
  it("splits block elements into lines", () => {
    expect(htmlToLines("<div>one</div><div>two</div>")).toEqual([
      "one",
      "two",
      "",
    ]);
  });
});
