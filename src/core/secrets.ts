/**
 * Podman secret store access
 *
 * Reads secrets written by Podman's file driver: `secrets.json` maps secret
 * names to ids, `filedriver/secretsdata.json` maps ids to base64 payloads.
 * Secrets are addressed as `{namespace}-{name}`.
 */

import { join } from "node:path";
import * as v from "valibot";
import { SecretError } from "../utils/errors.js";
import { fileExists, readJsonFile } from "../utils/fs.js";
import { logger } from "../utils/logger.js";

const indexSchema = v.looseObject({
  nameToID: v.record(v.string(), v.string()),
});

const dataSchema = v.record(v.string(), v.string());

async function readDocument<S extends v.GenericSchema>(path: string, schema: S): Promise<v.InferOutput<S>> {
  if (!(await fileExists(path))) {
    throw new SecretError(`Secret store file not found: ${path}`);
  }
  let data: unknown;
  try {
    data = await readJsonFile(path);
  } catch (error) {
    throw new SecretError(`Cannot read secret store file ${path}`, { cause: error });
  }
  const result = v.safeParse(schema, data);
  if (!result.success) {
    throw new SecretError(`Unexpected secret store format in ${path}`);
  }
  return result.output;
}

export class SecretStore {
  private constructor(
    private readonly nameToId: Readonly<Record<string, string>>,
    private readonly data: Readonly<Record<string, string>>,
  ) {}

  /**
   * Load the store rooted at `dir` (e.g. /var/lib/containers/storage/secrets)
   */
  static async load(dir: string): Promise<SecretStore> {
    const index = await readDocument(join(dir, "secrets.json"), indexSchema);
    const data = await readDocument(join(dir, "filedriver", "secretsdata.json"), dataSchema);
    return new SecretStore(index.nameToID, data);
  }

  static fullName(namespace: string, name: string): string {
    return `${namespace}-${name}`;
  }

  has(namespace: string, name: string): boolean {
    return Object.hasOwn(this.nameToId, SecretStore.fullName(namespace, name));
  }

  /**
   * Decoded value of a secret. The value is registered with the logger so it
   * never appears in output.
   */
  get(namespace: string, name: string): string {
    const fullName = SecretStore.fullName(namespace, name);
    const id = Object.hasOwn(this.nameToId, fullName) ? this.nameToId[fullName] : undefined;
    if (id === undefined) {
      throw new SecretError(`Secret not found: [${namespace}] ${name}`);
    }
    const encoded = Object.hasOwn(this.data, id) ? this.data[id] : undefined;
    if (encoded === undefined) {
      throw new SecretError(`Secret data missing for [${namespace}] ${name} (id ${id})`);
    }

    const value = Buffer.from(encoded, "base64").toString("utf8");
    logger.addSecret(value);
    return value;
  }
}
