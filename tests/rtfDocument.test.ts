import { describe, it, expect } from "vitest";
import { RtfDocument, escapeRtf } from "../src/rtf/document.js";

describe("escapeRtf", () => {
  it("should escape control characters", () => {
    expect(escapeRtf("a{b}\\c")).toBe("a\\{b\\}\\\\c");
  });

  it("should turn newlines and tabs into RTF controls", () => {
    expect(escapeRtf("one\r\ntwo\tthree")).toBe("one\\line two\\tab three");
  });

  it("should write non-ASCII characters as signed unicode escapes", () => {
    expect(escapeRtf("é")).toBe("\\u233?");
    expect(escapeRtf("😀")).toBe("\\u-10179?\\u-8704?");
  });
});

describe("RtfDocument", () => {
  it("should write an empty document with the default font", () => {
    expect(new RtfDocument("Helvetica").toRtf()).toBe(
      "{\\rtf1\\ansi\\deff0{\\fonttbl{\\f0 Helvetica;}}{\\colortbl;}\n}"
    );
  });

  it("should add each color to the table once", () => {
    const doc = new RtfDocument()
      .paragraph((p) => p.text("red", { color: "#FF0000" }))
      .paragraph((p) => p.text("also red", { color: "#ff0000", bold: true }))
      .paragraph((p) => p.text("green", { color: "#00ff00" }));

    expect(doc.toRtf()).toBe(
      [
        "{\\rtf1\\ansi\\deff0{\\fonttbl{\\f0 Arial;}}{\\colortbl;\\red255\\green0\\blue0;\\red0\\green255\\blue0;}",
        "\\pard\\plain\\f0 {\\cf1 red}\\par",
        "\\pard\\plain\\f0 {\\b\\cf1 also red}\\par",
        "\\pard\\plain\\f0 {\\cf2 green}\\par",
        "}",
      ].join("\n")
    );
  });

  it("should write links as HYPERLINK fields", () => {
    const doc = new RtfDocument().paragraph((p) =>
      p.link("https://example.com/?q=\"x\"", "example")
    );

    expect(doc.toRtf().split("\n")[1]).toBe(
      '\\pard\\plain\\f0 {\\field{\\*\\fldinst{HYPERLINK "https://example.com/?q=%22x%22"}}{\\fldrslt{example}}}\\par'
    );
  });

  it("should reject colors that are not #rrggbb", () => {
    const doc = new RtfDocument();
    expect(() => doc.paragraph((p) => p.text("x", { color: "blue" }))).toThrow(
      "Invalid RTF color: blue"
    );
  });
});
