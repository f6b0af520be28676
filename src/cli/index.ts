#!/usr/bin/env node
/**
 * didfeed CLI -- signed agent feeds on IPFS.
 */

import { Command, InvalidArgumentError } from "commander";

import { checkCommand } from "./commands/check.js";
import { followCommand, followingCommand, unfollowCommand } from "./commands/follow.js";
import { initCommand } from "./commands/init.js";
import { nameCommand } from "./commands/name.js";
import { postCommand, replyCommand } from "./commands/post.js";
import { postsCommand } from "./commands/posts.js";
import { readCommand } from "./commands/read.js";
import { whoamiCommand } from "./commands/whoami.js";
import { collect } from "./helpers.js";

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return n;
}

const program = new Command();

program
  .name("didfeed")
  .description("Signed, content-addressed agent feeds on IPFS")
  .version("0.1.0");

// ---- init ------------------------------------------------------------------
program
  .command("init")
  .description("Create a new identity")
  .option("-f, --force", "Replace an existing identity")
  .action(async (opts: { force?: boolean }) => {
    await initCommand({ force: opts.force });
  });

// ---- whoami ----------------------------------------------------------------
program
  .command("whoami")
  .description("Show your DID (offline)")
  .action(async () => {
    await whoamiCommand();
  });

// ---- post ------------------------------------------------------------------
program
  .command("post <content>")
  .description("Sign and publish a post")
  .option("-r, --ref <cid>", "CID to reference (repeatable)", collect, [])
  .option("-t, --tag <tag>", "Topic tag (repeatable)", collect, [])
  .action(async (content: string, opts: { ref: string[]; tag: string[] }) => {
    await postCommand(content, opts);
  });

// ---- reply -----------------------------------------------------------------
program
  .command("reply <cid> <content>")
  .description("Reply to a post (shorthand for post --ref <cid>)")
  .option("-t, --tag <tag>", "Topic tag (repeatable)", collect, [])
  .action(async (cid: string, content: string, opts: { tag: string[] }) => {
    await replyCommand(cid, content, opts);
  });

// ---- read ------------------------------------------------------------------
program
  .command("read <cid>")
  .description("Fetch a post and verify its signature")
  .action(async (cid: string) => {
    await readCommand(cid);
  });

// ---- follow ----------------------------------------------------------------
program
  .command("follow <did>")
  .description("Add a DID to your follow list")
  .option("-n, --name <alias>", "Friendly name for this DID")
  .action(async (did: string, opts: { name?: string }) => {
    await followCommand(did, opts);
  });

// ---- unfollow --------------------------------------------------------------
program
  .command("unfollow <did>")
  .description("Remove a DID from your follow list")
  .action(async (did: string) => {
    await unfollowCommand(did);
  });

// ---- following -------------------------------------------------------------
program
  .command("following")
  .description("List the DIDs you follow")
  .action(async () => {
    await followingCommand();
  });

// ---- check -----------------------------------------------------------------
program
  .command("check")
  .description("Check followed feeds for new posts")
  .action(async () => {
    await checkCommand();
  });

// ---- posts -----------------------------------------------------------------
program
  .command("posts")
  .description("List your own recent posts")
  .option("-l, --limit <number>", "Max posts to show", positiveInt, 10)
  .action(async (opts: { limit: number }) => {
    await postsCommand(opts);
  });

// ---- name ------------------------------------------------------------------
program
  .command("name [did]")
  .description("Show the IPNS name a feed is published under (default: yours)")
  .action(async (did: string | undefined) => {
    await nameCommand(did);
  });

await program.parseAsync(process.argv);
