/**
 * Error raised while normalizing or parsing a chemical formula.
 * `position` is the 0-based column in `formula`, or -1 when unknown.
 */
export class FormulaError extends Error {
  readonly formula: string;
  readonly position: number;

  constructor(message: string, formula = '', position = -1) {
    super(message);
    this.name = 'FormulaError';
    this.formula = formula;
    this.position = position;
  }

  /**
   * Message, formula and a caret under the offending column.
   */
  get detail(): string {
    if (this.position < 0) return this.message;
    return `${this.message}\n${this.formula}\n${'.'.repeat(this.position)}^`;
  }

  override toString(): string {
    return this.detail;
  }
}
