/** Contents of the instance lock record. */
export interface LockInfo {
  readonly pid: number;
  readonly hostname: string;
  readonly started_at: string; // ISO-8601, empty for legacy pid-only records
}
