// Minimal RTF 1 writer: one default font, a color table built from the
// colors in use, and paragraphs of plain, styled and hyperlinked runs.

export interface RunStyle {
  bold?: boolean;
  underline?: boolean;
  // `#rrggbb`
  color?: string;
}

interface Rgb {
  red: number;
  green: number;
  blue: number;
}

const HEX_COLOR = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;

function parseHexColor(hex: string): Rgb {
  const match = HEX_COLOR.exec(hex);
  if (!match) {
    throw new Error(`Invalid RTF color: ${hex}`);
  }
  return {
    red: parseInt(match[1], 16),
    green: parseInt(match[2], 16),
    blue: parseInt(match[3], 16),
  };
}

export function escapeRtf(text: string): string {
  let out = "";
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    const code = text.charCodeAt(i);
    if (ch === "\\" || ch === "{" || ch === "}") {
      out += `\\${ch}`;
    } else if (ch === "\n") {
      out += "\\line ";
    } else if (ch === "\r") {
      continue;
    } else if (ch === "\t") {
      out += "\\tab ";
    } else if (code > 127) {
      // \uN takes a signed 16-bit value; "?" is the fallback for old readers
      out += `\\u${code > 32767 ? code - 65536 : code}?`;
    } else {
      out += ch;
    }
  }
  return out;
}

export class RtfParagraph {
  private readonly runs: string[] = [];

  constructor(private readonly colorIndex: (hex: string) => number) {}

  text(content: string, style: RunStyle = {}): this {
    this.runs.push(this.styled(escapeRtf(content), style));
    return this;
  }

  link(url: string, content: string, style: RunStyle = {}): this {
    const target = escapeRtf(url).replace(/"/g, "%22");
    this.runs.push(
      `{\\field{\\*\\fldinst{HYPERLINK "${target}"}}{\\fldrslt${this.styled(escapeRtf(content), style, true)}}}`
    );
    return this;
  }

  toRtf(): string {
    return this.runs.join("");
  }

  private styled(content: string, style: RunStyle, forceGroup = false): string {
    const controls: string[] = [];
    if (style.bold) controls.push("\\b");
    if (style.color) controls.push(`\\cf${this.colorIndex(style.color)}`);
    if (style.underline) {
      controls.push("\\ul");
      if (style.color) controls.push(`\\ulc${this.colorIndex(style.color)}`);
    }

    if (controls.length === 0) {
      return forceGroup ? `{${content}}` : content;
    }
    return `{${controls.join("")} ${content}}`;
  }
}

export class RtfDocument {
  private readonly paragraphs: RtfParagraph[] = [];
  private readonly colors: string[] = [];

  constructor(readonly defaultFont: string = "Arial") {}

  paragraph(build?: (paragraph: RtfParagraph) => void): this {
    const paragraph = new RtfParagraph((hex) => this.colorIndex(hex));
    build?.(paragraph);
    this.paragraphs.push(paragraph);
    return this;
  }

  toRtf(): string {
    const colorTable = this.colors
      .map((hex) => {
        const { red, green, blue } = parseHexColor(hex);
        return `\\red${red}\\green${green}\\blue${blue};`;
      })
      .join("");

    const lines = [
      `{\\rtf1\\ansi\\deff0{\\fonttbl{\\f0 ${escapeRtf(this.defaultFont)};}}{\\colortbl;${colorTable}}`,
      ...this.paragraphs.map((p) => `\\pard\\plain\\f0 ${p.toRtf()}\\par`),
      "}",
    ];
    return lines.join("\n");
  }

  // Entry 0 of the color table is the reader's default color
  private colorIndex(hex: string): number {
    const normalized = hex.toLowerCase();
    parseHexColor(normalized);
    let index = this.colors.indexOf(normalized);
    if (index === -1) {
      this.colors.push(normalized);
      index = this.colors.length - 1;
    }
    return index + 1;
  }
}
