import { readIndexMetadata } from "../db/index.js";
import type { IndexMetadata } from "../types/entities.js";
import type { Writer } from "./output.js";

export async function runInfoCommand(
  indexPath: string,
  write: Writer,
): Promise<IndexMetadata> {
  const metadata = await readIndexMetadata(indexPath);

  write(`Index:     ${indexPath}`);
  write(`Root:      ${metadata.root}`);
  write(`Extension: ${metadata.extension}`);
  write(`Marker:    ${JSON.stringify(metadata.marker)}`);
  write(`Built at:  ${metadata.builtAt}`);
  write(`Files:     ${metadata.fileCount}`);
  write(`Names:     ${metadata.nameCount}`);
  return metadata;
}
