/**
 * didfeed posts -- list your own recent posts (offline).
 */

import { createAgent, cliError, errorMessage, formatPosts } from "../helpers.js";

export async function postsCommand(options: { limit: number }): Promise<void> {
  try {
    console.log(formatPosts(createAgent().posts(options.limit)));
  } catch (err) {
    cliError(`Error: ${errorMessage(err)}`);
  }
}
