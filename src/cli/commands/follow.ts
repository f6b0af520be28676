/**
 * didfeed follow / unfollow / following -- manage the follow list (offline).
 */

import { createAgent, cliError, errorMessage, formatFollowing } from "../helpers.js";

export async function followCommand(
  did: string,
  options: { name?: string }
): Promise<void> {
  try {
    const result = createAgent().follow(did, options.name);
    if (result.status === "already-following") {
      console.log(`Already following ${did}`);
      return;
    }
    console.log(`Now following: ${result.entry.alias ?? did}`);
  } catch (err) {
    cliError(`Error: ${errorMessage(err)}`);
  }
}

export async function unfollowCommand(did: string): Promise<void> {
  try {
    const result = createAgent().unfollow(did);
    if (result.status === "not-following") {
      console.log(`Not following ${did}`);
      return;
    }
    console.log(`Unfollowed: ${result.entry.alias ?? did}`);
  } catch (err) {
    cliError(`Error: ${errorMessage(err)}`);
  }
}

export async function followingCommand(): Promise<void> {
  try {
    console.log(formatFollowing(createAgent().following()));
  } catch (err) {
    cliError(`Error: ${errorMessage(err)}`);
  }
}
