export const DEFAULT_LABEL_LENGTH = 40;
export const DEFAULT_CONDITION_LENGTH = 60;

const ELLIPSIS = "...";

export class LabelSanitizer {
  private static readonly lineBreakRegex = /[ \t]*(?:\r\n|\r|\n)[ \t]*/g;
  private static readonly doubleSpaceRegex = / {2,}/g;
  // Characters mermaid reads as shape or edge-label delimiters
  private static readonly structuralRegex = /[(){}[\]<>|]/g;
  private static readonly escapeMap: Record<string, string> = {
    "(": "#40;",
    ")": "#41;",
    "{": "#123;",
    "}": "#125;",
    "[": "#91;",
    "]": "#93;",
    "<": "#60;",
    ">": "#62;",
    "|": "#124;",
  };

  /**
   * Makes text safe to embed in a node or edge label and caps its length.
   * Text over `maxLength` is cut to `maxLength - 3` characters plus `...`.
   */
  static sanitize(
    raw: string | null | undefined,
    maxLength: number = DEFAULT_LABEL_LENGTH
  ): string {
    if (!raw) return "";

    let label = raw
      .replace(/"/g, "'")
      .replace(this.lineBreakRegex, " ")
      .replace(this.doubleSpaceRegex, " ")
      .replace(this.structuralRegex, (match) => this.escapeMap[match] ?? match)
      .trim();

    if (label.length > maxLength) {
      label = label.substring(0, maxLength - ELLIPSIS.length) + ELLIPSIS;
    }

    return label;
  }

  static sanitizeCondition(
    raw: string | null | undefined,
    maxLength: number = DEFAULT_CONDITION_LENGTH
  ): string {
    return this.sanitize(raw, maxLength);
  }
}
