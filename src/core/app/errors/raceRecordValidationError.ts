export type RaceRecordIssue = {
  path: string;
  message: string;
  code: string;
};

export class RaceRecordValidationError extends Error {
  constructor(public readonly issues: RaceRecordIssue[]) {
    super(
      `Race record is invalid: ${issues.map((issue) => `${issue.path || '<root>'} ${issue.message}`).join('; ')}`,
    );
    this.name = 'RaceRecordValidationError';
  }
}
