/**
 * Represents how far through a pattern the user has worked.
 */
export class Cursor {
  constructor(
    public readonly row: number,
    public readonly col: number
  ) {}

  /**
   * Create a string key for use in Sets or Maps.
   */
  toKey(): string {
    return `${this.row},${this.col}`;
  }

  /**
   * Check equality with another cursor.
   */
  equals(other: Cursor): boolean {
    return this.row === other.row && this.col === other.col;
  }

  /**
   * Lexicographic comparison: negative if this cursor is before `other`.
   */
  compare(other: Cursor): number {
    return this.row !== other.row ? this.row - other.row : this.col - other.col;
  }

  /**
   * Create a copy of this cursor.
   */
  clone(): Cursor {
    return new Cursor(this.row, this.col);
  }

  toJSON(): { row: number; col: number } {
    return { row: this.row, col: this.col };
  }

  toString(): string {
    return `Cursor(${this.row}, ${this.col})`;
  }
}
