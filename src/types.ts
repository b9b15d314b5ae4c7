export type EditPermission = "everybody" | "ten_edits" | "fifty_edits" | "select_users";
export type PresenceMode = "edit" | "view";

export interface CurrentUser {
  id: string;
  username: string;
  isAdmin: boolean;
}

export interface WikiPage {
  title: string;
  branch: string;
  content: string;
  author: string;
  editSummary: string;
  editPermission: EditPermission;
  allowedUsers: string[];
  createdAt: string;
  updatedAt: string;
}

export interface HistoryEntry extends WikiPage {
  id: number;
  archivedAt: string;
}

export interface WikiPageSummary {
  title: string;
  branch: string;
  author: string;
  excerpt: string;
  updatedAt: string;
}

export interface BranchRecord {
  pageTitle: string;
  branchName: string;
  createdFrom: string;
  createdAt: string;
}

export interface VersionEntry {
  index: number;
  displayNumber: number;
  author: string;
  updatedAt: string;
  editSummary: string;
  isCurrent: boolean;
}

export interface UserEditStats {
  username: string;
  totalEdits: number;
  pageEdits: Record<string, number>;
}

export interface EditPresenceLease {
  sessionId: string;
  clientId: string;
  userId: string;
  username: string;
  page: string;
  branch: string;
  mode: PresenceMode;
  leaseExpiresAt: number;
  lastHeartbeat: number;
  createdAt: number;
}

export interface PresenceEditor {
  username: string;
  clientId: string;
}

export interface PresenceRoster {
  editors: PresenceEditor[];
}

export interface WikiLogger {
  info: (obj: Record<string, unknown>, msg: string) => void;
  warn: (obj: Record<string, unknown>, msg: string) => void;
  error: (obj: Record<string, unknown>, msg: string) => void;
}

export interface VersionDetail extends VersionEntry {
  content: string;
}
