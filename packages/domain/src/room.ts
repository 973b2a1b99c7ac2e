export type RoomKind = 'direct' | 'board' | 'chat';

export type RoomAddress =
  | { kind: 'direct'; id: string; userId: string }
  | { kind: 'board'; id: string; boardId: string }
  | { kind: 'chat'; scope: 'general'; id: string; name: string }
  | { kind: 'chat'; scope: 'direct'; id: string; participants: readonly [string, string] }
  | { kind: 'chat'; scope: 'organization'; id: string; organizationId: string };

const SEGMENT = /^[A-Za-z0-9_.-]{1,128}$/;

function valid(...segments: string[]): boolean {
  return segments.every((s) => SEGMENT.test(s));
}

/**
 * Parses a self-describing room id:
 *
 *   direct:{userId}
 *   board:{boardId}
 *   chat:general:{name}
 *   chat:direct:{userA}:{userB}
 *   chat:organization:{organizationId}
 */
export function parseRoomId(id: string): RoomAddress | null {
  const parts = id.split(':');
  const [prefix, a = '', b = '', c = ''] = parts;

  switch (prefix) {
    case 'direct':
      return parts.length === 2 && valid(a) ? { kind: 'direct', id, userId: a } : null;
    case 'board':
      return parts.length === 2 && valid(a) ? { kind: 'board', id, boardId: a } : null;
    case 'chat':
      if (a === 'general' && parts.length === 3 && valid(b)) {
        return { kind: 'chat', scope: 'general', id, name: b };
      }
      if (a === 'direct' && parts.length === 4 && valid(b, c) && b !== c) {
        return { kind: 'chat', scope: 'direct', id, participants: [b, c] };
      }
      if (a === 'organization' && parts.length === 3 && valid(b)) {
        return { kind: 'chat', scope: 'organization', id, organizationId: b };
      }
      return null;
    default:
      return null;
  }
}

export function directRoomId(userId: string): string {
  return `direct:${userId}`;
}

/** Both participants derive the same id regardless of who opens the chat. */
export function directChatRoomId(userA: string, userB: string): string {
  const [first, second] = userA < userB ? [userA, userB] : [userB, userA];
  return `chat:direct:${first}:${second}`;
}
