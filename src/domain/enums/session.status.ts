export const SessionStatuses = [
    'open',
    'receiving',
    'completed',
    'failed'
] as const;

export type SessionStatus = typeof SessionStatuses[number]

// Statuses a session never leaves once reached
export const TerminalSessionStatuses: readonly SessionStatus[] = ['completed', 'failed'];
