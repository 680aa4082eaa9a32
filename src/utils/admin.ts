import { PermissionFlagsBits } from 'discord.js';

export interface AdminLists {
  adminUserIds: readonly string[];
  adminRoleIds: readonly string[];
}

/** Covers both a cached GuildMember and the raw member an interaction carries. */
export interface MemberLike {
  permissions?: { has(permission: bigint): boolean } | string;
  roles?: { cache: { has(id: string): boolean } } | string[];
}

function hasRole(roles: MemberLike['roles'], roleIds: readonly string[]): boolean {
  if (!roles) return false;
  if (Array.isArray(roles)) return roles.some((id) => roleIds.includes(id));
  return roleIds.some((id) => roles.cache.has(id));
}

export function isAdmin(member: MemberLike | null, userId: string, lists: AdminLists): boolean {
  if (lists.adminUserIds.includes(userId)) return true;
  if (!member) return false;

  const perms = member.permissions;
  if (typeof perms === 'string') {
    // raw interaction members carry the permission bitfield as a string
    if ((BigInt(perms) & PermissionFlagsBits.Administrator) === PermissionFlagsBits.Administrator) return true;
  } else if (perms && perms.has(PermissionFlagsBits.Administrator)) {
    return true;
  }

  if (lists.adminRoleIds.length === 0) return false;
  return hasRole(member.roles, lists.adminRoleIds);
}
