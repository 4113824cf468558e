/**
 * 会话访问控制
 *
 * 四级角色模型：owner > admin > member > viewer。
 * 全部为纯函数，输入参与者记录（可能不存在），不访问存储。
 */

import type { Participant, ParticipantRole } from '../types/chat.js';

/** 策略判定结果 */
export type PolicyDecision =
  | { allowed: true }
  | { allowed: false; reason: string };

type MaybeParticipant = Participant | null | undefined;

const POSTING_ROLES: ReadonlySet<ParticipantRole> = new Set(['owner', 'admin', 'member']);
const ADMIN_ROLES: ReadonlySet<ParticipantRole> = new Set(['owner', 'admin']);

const ALLOW: PolicyDecision = { allowed: true };

function deny(reason: string): PolicyDecision {
  return { allowed: false, reason };
}

/** 可查看会话：记录存在且活跃 */
export function canView(participant: MaybeParticipant): boolean {
  return participant?.isActive === true;
}

/** 可发言 */
export function canPost(participant: MaybeParticipant): boolean {
  return participant?.isActive === true && POSTING_ROLES.has(participant.role);
}

/** 可管理成员与会话设置 */
export function canAdminister(participant: MaybeParticipant): boolean {
  return participant?.isActive === true && ADMIN_ROLES.has(participant.role);
}

/** 是否为活跃 owner */
export function isOwner(participant: MaybeParticipant): boolean {
  return participant?.isActive === true && participant.role === 'owner';
}

/**
 * 角色变更
 *
 * - 操作者必须可管理
 * - 涉及 owner 的变更（目标当前是 owner，或新角色为 owner）只有 owner 能发起
 * - owner 记录本身不能被降级（转让所有权由 owner 提升他人完成）
 */
export function checkRoleChange(
  actor: MaybeParticipant,
  target: MaybeParticipant,
  newRole: ParticipantRole,
): PolicyDecision {
  if (!canAdminister(actor)) {
    return deny('需要管理员权限');
  }
  if (!target || !target.isActive) {
    return deny('目标用户不是该会话的活跃成员');
  }
  if (target.role === 'owner') {
    return deny('不能修改会话创建者的角色');
  }
  if (newRole === 'owner' && !isOwner(actor)) {
    return deny('只有会话创建者可以转让所有权');
  }
  return ALLOW;
}

/**
 * 移除成员：操作者必须可管理，owner 不可被移除
 */
export function checkRemoval(actor: MaybeParticipant, target: MaybeParticipant): PolicyDecision {
  if (!canAdminister(actor)) {
    return deny('需要管理员权限');
  }
  if (!target || !target.isActive) {
    return deny('目标用户不是该会话的活跃成员');
  }
  if (target.role === 'owner') {
    return deny('不能移除会话创建者');
  }
  return ALLOW;
}

/** 主动离开：owner 不能离开自己的会话 */
export function checkLeave(participant: MaybeParticipant): PolicyDecision {
  if (!canView(participant)) {
    return deny('不是该会话的活跃成员');
  }
  if (isOwner(participant)) {
    return deny('会话创建者不能离开会话');
  }
  return ALLOW;
}
