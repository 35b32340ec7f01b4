/**
 * Error thrown when a rule definition cannot be loaded or compiled.
 * Always a startup failure; classification itself never throws.
 */
export class PatternLibraryError extends Error {
  constructor(
    message: string,
    public readonly ruleId?: string,
    public readonly source?: string
  ) {
    super(message)
    this.name = 'PatternLibraryError'
  }
}
