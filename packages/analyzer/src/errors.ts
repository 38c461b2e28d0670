/** Raised when there is nothing to analyze, before any aggregate is computed */
export class EmptyDatasetError extends Error {
  constructor(message = 'No records to analyze') {
    super(message);
    this.name = 'EmptyDatasetError';
  }
}
