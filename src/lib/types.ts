/** A commit as read from `git log`, before any ChangeId interpretation. */
export interface CommitEntry {
  commitId: string;
  treeId: string;
  parents: string[];
  authorName: string;
  authorEmail: string;
  authorDate: string;
  message: string;
}

export interface LocalEntry {
  changeId: string;
  commitId: string;
  subject: string;
  body: string;
  position: number; // 0 = nearest to the base branch
}

// Entries are ordered from base to tip (entries[0] sits directly on baseBranch)
export interface Stack {
  baseBranch: string;
  entries: LocalEntry[];
}

export interface BranchRef {
  name: string;
  commitId: string;
}

export interface ReviewMetadata {
  id: number;
  url: string;
  title: string;
  sourceBranch: string;
  targetBranch: string;
  state: "open" | "closed";
}

export interface ResolvedRemoteEntry {
  kind: "resolved";
  changeId: string;
  branch: string;
  commitId: string;
  review?: ReviewMetadata; // only an open review is recorded here
}

export type ReviewedRemoteEntry = ResolvedRemoteEntry & {
  review: ReviewMetadata;
};

// AIDEV-NOTE: An unknown entry means the branch exists but its review lookup failed.
// It must never be treated as absent, otherwise a second review could be opened.
export interface UnknownRemoteEntry {
  kind: "unknown";
  changeId: string;
  branch: string;
  commitId: string;
  reason: string;
}

export type RemoteEntry = ResolvedRemoteEntry | UnknownRemoteEntry;

export interface RemoteState {
  entries: Map<string, RemoteEntry>;
  warnings: string[];
}

export interface CreateOperation {
  kind: "create";
  entry: LocalEntry;
  target: string;
  existingBranch?: ResolvedRemoteEntry; // branch already pushed but without an open review
}

export interface UpdateOperation {
  kind: "update";
  entry: LocalEntry;
  remote: ReviewedRemoteEntry | UnknownRemoteEntry;
  reason: "content-changed" | "unknown-remote";
  retargetTo?: string;
}

export interface RetargetOperation {
  kind: "retarget";
  entry: LocalEntry;
  remote: ReviewedRemoteEntry;
  target: string;
}

export interface NoOpOperation {
  kind: "noop";
  entry: LocalEntry;
  remote: ReviewedRemoteEntry;
}

export interface CloseAndDeleteOperation {
  kind: "close-and-delete";
  remote: ResolvedRemoteEntry;
}

export type Operation =
  | CreateOperation
  | UpdateOperation
  | RetargetOperation
  | NoOpOperation
  | CloseAndDeleteOperation;

export type StackOperation = Exclude<Operation, CloseAndDeleteOperation>;

export interface Plan {
  baseBranch: string;
  operations: Operation[]; // stack operations base to tip, then close-and-delete
  warnings: string[];
}

export type OperationStatus =
  | "created"
  | "updated"
  | "retargeted"
  | "closed"
  | "no-op"
  | "skipped"
  | "failed";

export interface OperationOutcome {
  changeId: string;
  operation: Operation["kind"];
  status: OperationStatus;
  review?: ReviewMetadata;
  error?: Error;
}

export interface ExecutionReport {
  success: boolean;
  cancelled: boolean;
  outcomes: OperationOutcome[];
  warnings: string[];
  /** Remote entries as they stand after the run, tracked without re-querying. */
  remote: Map<string, RemoteEntry>;
}
