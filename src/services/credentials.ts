import { readFile } from "node:fs/promises";
import * as readline from "node:readline/promises";
import { stdin, stdout } from "node:process";
import { Writable } from "node:stream";
import argon2 from "argon2";
import kdbxweb from "kdbxweb";
import type { Kdbx, KdbxEntry, KdbxGroup } from "kdbxweb";
import type { ApiCredentials } from "../api/client.js";
import type { KeePassConfig } from "../config.js";
import { CredentialError } from "../errors.js";

export interface CredentialProvider {
  resolve(): Promise<ApiCredentials>;
}

const ARGON2_TYPE_ID = 2;

let argon2Registered = false;

// kdbxweb ships no Argon2; KDBX 4 databases need one for key derivation.
export function registerArgon2(): void {
  if (argon2Registered) return;
  kdbxweb.CryptoEngine.setArgon2Impl(
    async (password, salt, memory, iterations, length, parallelism, type, version) => {
      const hash = await argon2.hash(Buffer.from(password), {
        raw: true,
        salt: Buffer.from(salt),
        memoryCost: memory,
        timeCost: iterations,
        hashLength: length,
        parallelism,
        type: type === ARGON2_TYPE_ID ? argon2.argon2id : argon2.argon2d,
        version,
      });
      return new Uint8Array(hash).buffer;
    },
  );
  argon2Registered = true;
}

async function promptPassword(question: string): Promise<string> {
  const muted = new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
  const rl = readline.createInterface({ input: stdin, output: muted, terminal: true });
  try {
    stdout.write(question);
    return await rl.question("");
  } finally {
    stdout.write("\n");
    rl.close();
  }
}

function fieldText(entry: KdbxEntry, field: string): string | undefined {
  const value = entry.fields.get(field);
  if (value === undefined) return undefined;
  return typeof value === "string" ? value : value.getText();
}

function findByTitle(group: KdbxGroup, title: string): KdbxEntry | undefined {
  const direct = group.entries.find((entry) => fieldText(entry, "Title") === title);
  if (direct) return direct;
  for (const child of group.groups) {
    const found = findByTitle(child, title);
    if (found) return found;
  }
  return undefined;
}

/**
 * Resolve `Group/Sub/Title` below the root group. A bare title is searched
 * for in the whole tree, depth first.
 */
export function findEntry(root: KdbxGroup, entryPath: string): KdbxEntry {
  const parts = entryPath
    .split("/")
    .map((part) => part.trim())
    .filter((part) => part !== "");
  const title = parts.pop();
  if (!title) {
    throw new CredentialError(`Invalid KeePass entry path: "${entryPath}"`);
  }

  if (parts.length === 0) {
    const entry = findByTitle(root, title);
    if (!entry) throw new CredentialError(`KeePass entry "${title}" not found`);
    return entry;
  }

  let group = root;
  for (const name of parts) {
    const next = group.groups.find((child) => child.name === name);
    if (!next) {
      throw new CredentialError(`KeePass group "${name}" not found in "${entryPath}"`);
    }
    group = next;
  }

  const entry = group.entries.find((candidate) => fieldText(candidate, "Title") === title);
  if (!entry) {
    throw new CredentialError(`KeePass entry "${entryPath}" not found`);
  }
  return entry;
}

export function readCredentials(
  entry: KdbxEntry,
  keyField: string,
  secretField: string,
): ApiCredentials {
  const apiKey = fieldText(entry, keyField);
  const apiSecret = fieldText(entry, secretField);
  if (!apiKey) throw new CredentialError(`KeePass entry has no value in field "${keyField}"`);
  if (!apiSecret) throw new CredentialError(`KeePass entry has no value in field "${secretField}"`);
  return { apiKey, apiSecret };
}

async function readBytes(filePath: string, what: string): Promise<ArrayBuffer> {
  try {
    return new Uint8Array(await readFile(filePath)).buffer;
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CredentialError(`Cannot read KeePass ${what} ${filePath}: ${reason}`, { cause: err });
  }
}

async function openDatabase(config: KeePassConfig): Promise<Kdbx> {
  const data = await readBytes(config.databasePath, "database");
  const keyFile = config.keyFilePath ? await readBytes(config.keyFilePath, "key file") : null;
  const password =
    config.password ?? (await promptPassword(`KeePass password for ${config.databasePath}: `));

  registerArgon2();
  const credentials = new kdbxweb.Credentials(kdbxweb.ProtectedValue.fromString(password), keyFile);
  try {
    return await kdbxweb.Kdbx.load(data, credentials);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CredentialError(`Cannot open KeePass database ${config.databasePath}: ${reason}`, {
      cause: err,
    });
  }
}

/** Open the database, read the API key pair from the configured entry, and let it go. */
export async function resolveCredentials(config: KeePassConfig): Promise<ApiCredentials> {
  const db = await openDatabase(config);
  const entry = findEntry(db.getDefaultGroup(), config.entryPath);
  const credentials = readCredentials(entry, config.keyField, config.secretField);
  console.log(`Loaded API credentials from KeePass entry "${config.entryPath}".`);
  return credentials;
}

export function keePassCredentialProvider(config: KeePassConfig): CredentialProvider {
  return { resolve: () => resolveCredentials(config) };
}
