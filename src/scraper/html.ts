import { decodeHTML } from "entities";
import { Parser } from "htmlparser2";

const SKIPPED_TAGS = new Set(["script", "style"]);

/** Decode every HTML5 named and numeric character reference. Unknown names are left as written. */
export function decodeEntities(text: string): string {
  return decodeHTML(text);
}

interface TextScan {
  title: string;
  chunks: string[];
}

/**
 * Tokenize once: text nodes outside script and style (entity-decoded, trimmed,
 * empty ones dropped) plus the content of the first `<title>`.
 */
function scan(html: string): TextScan {
  const chunks: string[] = [];
  let pending = "";
  let skipDepth = 0;
  let titleState: "before" | "inside" | "done" = "before";
  let title = "";

  const flush = (): void => {
    const text = pending.trim();
    if (text) chunks.push(text);
    pending = "";
  };

  const parser = new Parser(
    {
      onopentagname(name) {
        flush();
        if (SKIPPED_TAGS.has(name)) skipDepth += 1;
        if (name === "title" && titleState === "before") titleState = "inside";
      },
      onclosetag(name) {
        flush();
        if (SKIPPED_TAGS.has(name) && skipDepth > 0) skipDepth -= 1;
        if (name === "title" && titleState === "inside") titleState = "done";
      },
      ontext(text) {
        if (titleState === "inside") title += text;
        if (skipDepth === 0) pending += text;
      },
    },
    { decodeEntities: true },
  );
  parser.write(html);
  parser.end();
  flush();

  return { title: title.trim(), chunks };
}

export function extractTitle(html: string): string {
  return scan(html).title;
}

/**
 * Text content of a document: each text node trimmed, empty ones dropped,
 * joined by newlines. Comments and the bodies of script and style are skipped.
 */
export function htmlToText(html: string): string {
  return scan(html).chunks.join("\n");
}
