export interface FrameworkMetadata {
  frameworkId: string;
  name: string | null;
  version: string | null;
  effectiveDate: string | null;
}
