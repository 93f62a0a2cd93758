import { loadContext, type AppContext } from "../context";
import { describeError } from "../errors";

export interface ListOptions {
  json?: boolean;
}

export async function listCommand(
  options: ListOptions = {},
  context?: AppContext
): Promise<void> {
  let albums: string[];
  try {
    const ctx = context ?? loadContext();
    albums = await ctx.repository.listAlbums();
  } catch (error) {
    // Listing never fails the process
    console.error(`Failed to list albums: ${describeError(error)}`);
    return;
  }

  if (options.json) {
    console.log(JSON.stringify(albums, null, 2));
    return;
  }

  if (albums.length === 0) {
    console.log("No albums found");
    return;
  }

  for (const album of albums) {
    console.log(album);
  }
}
