/**
 * Helpers for classifying errors thrown by node:fs, child processes and
 * npm packages that wrap them. Error `code` is checked first, message text
 * second.
 */

export const errorCode = (error: unknown): string | undefined =>
  typeof error === "object" && error !== null && "code" in error && typeof error.code === "string"
    ? error.code.toUpperCase()
    : undefined

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

export const isPermissionError = (error: unknown): boolean => {
  const code = errorCode(error)
  if (code === "EACCES" || code === "EPERM") {
    return true
  }

  const message = errorMessage(error).toLowerCase()
  return (
    message.includes("eacces") ||
    message.includes("permission denied") ||
    message.includes("operation not permitted") ||
    message.includes("eperm")
  )
}

export const isNotFoundError = (error: unknown): boolean => {
  const code = errorCode(error)
  if (code === "ENOENT" || code === "ENOTDIR") {
    return true
  }

  const message = errorMessage(error).toLowerCase()
  return message.includes("enoent") || message.includes("no such file")
}
