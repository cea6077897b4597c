export const COMMIT_RECORD_SEPARATOR = "\u001e";
export const COMMIT_FIELD_SEPARATOR = "\u001f";

// hash, parent hashes, author name, author time (unix), raw body
export const GIT_LOG_FORMAT = "%x1e%H%x1f%P%x1f%an%x1f%at%x1f%B";
