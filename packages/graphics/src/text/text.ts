import type { TextLine } from "@collage/rendering-core";
import type { Color } from "../color/color.js";
import { black } from "../color/palette.js";

export type { TextLine };

/** Where a run of text sits relative to its form's origin. */
export type TextPosition = "center" | "toLeft" | "toRight";

/**
 * A missing `typeface` or `height` falls back to the renderer's defaults.
 */
export type TextStyle = {
  typeface: string | null;
  height: number | null;
  color: Color;
  bold: boolean;
  italic: boolean;
  line: TextLine | null;
  monospace: boolean;
};

export type TextUnit = {
  string: string;
  style: TextStyle;
};

export const DEFAULT_TEXT_HEIGHT = 16;

export function defaultTextStyle(): TextStyle {
  return {
    typeface: null,
    height: null,
    color: black(),
    bold: false,
    italic: false,
    line: null,
    monospace: false
  };
}

/**
 * Styled, single-line text. Style builders apply to every unit of the sequence.
 */
export class Text {
  constructor(
    readonly sequence: readonly TextUnit[],
    readonly position: TextPosition = "center",
  ) {}

  static fromString(string: string): Text {
    return new Text([{ string, style: defaultTextStyle() }]);
  }

  static empty(): Text {
    return Text.fromString("");
  }

  /** Keeps the position of the first text. */
  static concat(texts: readonly Text[]): Text {
    const position = texts[0]?.position ?? "center";
    return new Text(
      texts.flatMap((t) => t.sequence),
      position,
    );
  }

  /** Puts `separator` between consecutive texts. */
  static join(separator: Text, texts: readonly Text[]): Text {
    const parts: Text[] = [];
    texts.forEach((text, i) => {
      if (i > 0) parts.push(separator);
      parts.push(text);
    });
    return Text.concat(parts);
  }

  append(other: Text): Text {
    return new Text([...this.sequence, ...other.sequence], this.position);
  }

  /**
   * Collapses the text into a single unit with the given style.
   */
  style(style: TextStyle): Text {
    const string = this.sequence.map((unit) => unit.string).join("");
    return new Text([{ string, style }], this.position);
  }

  typeface(path: string): Text {
    return this.mapStyle((s) => ({ ...s, typeface: path }));
  }

  monospace(): Text {
    return this.mapStyle((s) => ({ ...s, monospace: true }));
  }

  /** Height in pixels. */
  height(h: number): Text {
    return this.mapStyle((s) => ({ ...s, height: h }));
  }

  color(color: Color): Text {
    return this.mapStyle((s) => ({ ...s, color }));
  }

  bold(): Text {
    return this.mapStyle((s) => ({ ...s, bold: true }));
  }

  italic(): Text {
    return this.mapStyle((s) => ({ ...s, italic: true }));
  }

  line(line: TextLine): Text {
    return this.mapStyle((s) => ({ ...s, line }));
  }

  withPosition(position: TextPosition): Text {
    return new Text(this.sequence, position);
  }

  private mapStyle(fn: (style: TextStyle) => TextStyle): Text {
    return new Text(
      this.sequence.map((unit) => ({ string: unit.string, style: fn(unit.style) })),
      this.position,
    );
  }
}
