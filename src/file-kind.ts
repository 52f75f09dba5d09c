/**
 * Coarse file kind for the progress list icon. Extension wins for fonts,
 * source code and PDFs; otherwise the advisory mime type decides.
 */

import type { FileHeader } from "../server/protocol.js";

export type FileKind = "font" | "code" | "pdf" | "image" | "audio" | "video" | "text" | "binary" | "file";

const FONT_EXTENSIONS = new Set(["ttf", "otf", "woff", "woff2"]);
const CODE_EXTENSIONS = new Set([
  "ts", "tsx", "js", "jsx", "json", "yaml", "yml", "toml", "go", "rs", "java", "kt", "swift",
  "c", "cc", "cpp", "h", "hpp", "cs", "py", "rb", "php", "lua", "sh", "ps1", "md", "tex",
]);

const MIME_KINDS: Array<[prefix: string, kind: FileKind]> = [
  ["image/", "image"],
  ["audio/", "audio"],
  ["video/", "video"],
  ["text/", "text"],
  ["application/", "binary"],
];

export const KIND_GLYPHS: Record<FileKind, string> = {
  font: "🔤",
  code: "📜",
  pdf: "📕",
  image: "🖼",
  audio: "🎵",
  video: "🎞",
  text: "📄",
  binary: "📦",
  file: "📁",
};

function extensionOf(name: string): string {
  const base = name.slice(name.lastIndexOf("/") + 1);
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(dot + 1).toLowerCase() : "";
}

export function fileKind(header: Pick<FileHeader, "name" | "mime">): FileKind {
  const ext = extensionOf(header.name);
  if (FONT_EXTENSIONS.has(ext)) return "font";
  if (CODE_EXTENSIONS.has(ext)) return "code";
  if (ext === "pdf") return "pdf";
  for (const [prefix, kind] of MIME_KINDS) {
    if (header.mime.startsWith(prefix)) return kind;
  }
  return "file";
}
