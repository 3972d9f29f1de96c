export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Last segment of an IAM/STS ARN, e.g. the session name of an assumed role. */
export function nameFromArn(arn: string | undefined): string {
  if (!arn) {
    return "";
  }
  const parts = arn.split("/");
  return parts[parts.length - 1];
}
