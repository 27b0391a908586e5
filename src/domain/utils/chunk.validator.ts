import path from "path";

export interface ChunkFileRules {
  allowedExtensions: readonly string[];
  maxFileSizeBytes: number;
}

export interface ChunkFileValidation {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  fileExtension: string;
}

export function getFileExtension(filename: string): string {
  return path.extname(filename).replace(/^\./, "").toLowerCase();
}

export function validateChunkFile(
  file: { originalName: string; sizeBytes: number },
  rules: ChunkFileRules
): ChunkFileValidation {
  const errors: string[] = [];
  const warnings: string[] = [];
  const fileExtension = getFileExtension(file.originalName);

  if (!fileExtension) {
    errors.push("File has no extension");
  } else if (!rules.allowedExtensions.includes(fileExtension)) {
    errors.push(
      `Unsupported file type .${fileExtension}; allowed: ${rules.allowedExtensions.join(", ")}`
    );
  }

  if (file.sizeBytes === 0) {
    errors.push("File is empty");
  } else if (file.sizeBytes > rules.maxFileSizeBytes) {
    errors.push(
      `File size ${file.sizeBytes} bytes exceeds maximum allowed size of ${rules.maxFileSizeBytes} bytes`
    );
  } else if (file.sizeBytes < 1024) {
    warnings.push("File is very small and may not contain audio");
  }

  return { isValid: errors.length === 0, errors, warnings, fileExtension };
}

export function validateSessionId(sessionId: unknown): string[] {
  if (typeof sessionId !== "string" || sessionId.trim().length === 0) {
    return ["sessionId is required"];
  }
  if (sessionId.length > 128 || !/^[A-Za-z0-9_.:-]+$/.test(sessionId)) {
    return ["sessionId may only contain letters, digits, '_', '-', '.', ':' and be at most 128 characters"];
  }
  return [];
}
