export const UploadStatuses = [
    'uploaded',
    'failed'
] as const;

export type UploadStatus = typeof UploadStatuses[number]

export const TranscriptionStatuses = [
    'pending',
    'processing',
    'completed',
    'failed'
] as const;

export type TranscriptionStatus = typeof TranscriptionStatuses[number]

export function isSettled(status: TranscriptionStatus): boolean {
    return status === 'completed' || status === 'failed';
}
