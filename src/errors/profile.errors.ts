export class ProfileValidationError extends Error {
  profileId: string;
  issues: string[];

  constructor(profileId: string, issues: string[]) {
    super(`Profile "${profileId}" is invalid: ${issues.join("; ")}`);
    this.name = "ProfileValidationError";
    this.profileId = profileId;
    this.issues = issues;
  }
}

export class UnknownProfileError extends Error {
  profileId: string;
  available: string[];

  constructor(profileId: string, available: string[]) {
    super(`Unknown profile "${profileId}". Available profiles: ${available.join(", ")}.`);
    this.name = "UnknownProfileError";
    this.profileId = profileId;
    this.available = available;
  }
}
