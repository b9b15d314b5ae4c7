import type { EditPermission } from "../types.js";

const TEN_EDITS = 10;
const FIFTY_EDITS = 50;

/**
 * Decides whether a user may edit a page guarded by `permission`.
 * Pass `userId = null` for anonymous visitors.
 */
export const canEdit = (
  permission: EditPermission,
  allowedUsers: readonly string[],
  userEditCount: number,
  userId: string | null
): boolean => {
  if (permission === "everybody") return true;
  if (!userId) return false;

  switch (permission) {
    case "ten_edits":
      return userEditCount >= TEN_EDITS;
    case "fifty_edits":
      return userEditCount >= FIFTY_EDITS;
    case "select_users": {
      const needle = userId.trim().toLowerCase();
      return allowedUsers.some((entry) => entry.trim().toLowerCase() === needle);
    }
  }
};
