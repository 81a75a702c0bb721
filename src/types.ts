export type AppKind = "streamlit" | "gradio" | "flask";
export type ChatRole = "system" | "user" | "assistant";
export type LedgerStatus = "In Progress" | "Done";
export type UnmappedImportPolicy = "drop" | "passthrough";
export type CiTriggerStrategy = "dispatch" | "recommit";

export type LaunchPhase =
  | "idle"
  | "generating"
  | "generated"
  | "publishing"
  | "secret-provisioning"
  | "deploying"
  | "deployed"
  | "failed";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface AppKindProfile {
  kind: AppKind;
  label: string;
  fenceTag: string;
  entryFile: string;
  toolkitPackage: string;
  runtimePackages: string[];
  runCommand: string;
  promptConstraints: string[];
}

export interface GenerationRequest {
  readonly idea: string;
  readonly kind: AppKind;
  readonly repoName?: string;
  readonly pitchDeck: boolean;
  readonly document: boolean;
}

export interface GeneratedArtifact {
  code: string;
  requirements: string;
}

export interface DeploymentRecord {
  uniqueId: string;
  prompt: string;
  repoName: string;
  status: LedgerStatus;
  pitchDeck: boolean;
  document: boolean;
  pitchDeckUrl: string | null;
  documentUrl: string | null;
  appUrl: string | null;
  createdTime: string;
}

export type DeploymentRecordPatch = Partial<Pick<DeploymentRecord, "repoName" | "pitchDeckUrl" | "documentUrl" | "appUrl">>;

export interface RemoteRepository {
  owner: string;
  name: string;
  fullName: string;
  defaultBranch: string;
  htmlUrl: string;
}

export interface CommittedFile {
  path: string;
  sha: string;
}

export interface PlatformApplication {
  name: string;
  url: string;
}

export type ReleaseOutcome = "deployed" | "unconfirmed";

export interface DeploymentOutcome {
  application: PlatformApplication;
  outcome: ReleaseOutcome;
  releaseVersion: number | null;
}

export interface MaterialLinks {
  uniqueId: string;
  pitchDeckUrl: string | null;
  documentUrl: string | null;
}

export interface DeploymentContext {
  readonly sessionId: string;
  readonly phase: LaunchPhase;
  readonly request: GenerationRequest;
  readonly uniqueId: string | null;
  readonly artifact: GeneratedArtifact | null;
  readonly repository: RemoteRepository | null;
  readonly committedFiles: readonly CommittedFile[];
  readonly deployment: DeploymentOutcome | null;
  readonly materialsRequested: boolean;
  readonly error: { kind: string; message: string } | null;
  readonly updatedAt: string;
}
