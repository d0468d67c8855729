const INVALID_FOLDER_CHARACTERS = /[<>:"/\\|?*\u0000-\u001F]/;

/** Error message for an unusable project folder name, or `undefined` when it is fine. */
export function validateProjectName(value: string | undefined): string | undefined {
  const trimmed = value?.trim() ?? "";
  if (!trimmed) return "Project name is required.";
  if (trimmed === "." || trimmed === "..") return "Project name must name a new folder.";
  if (INVALID_FOLDER_CHARACTERS.test(trimmed)) {
    return 'Project name cannot contain <>:"/\\|?* or control characters.';
  }
  if (/\s/.test(trimmed)) return "Project name cannot contain spaces.";
  return undefined;
}

export function bulletList(items: readonly string[], bullet = "•"): string {
  return items.map((item) => `${bullet} ${item}`).join("\n");
}
