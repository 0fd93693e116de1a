/**
 * Where the active policy comes from
 */

import fs from "fs/promises";
import { PolicyConfigError } from "../errors";
import { SecurityPolicy, parsePolicy } from "./securityPolicy";

export interface PolicySource {
  getPolicy(): Promise<SecurityPolicy>;
}

export class StaticPolicySource implements PolicySource {
  private policy: SecurityPolicy;

  constructor(policy: SecurityPolicy) {
    this.policy = policy;
  }

  async getPolicy(): Promise<SecurityPolicy> {
    return this.policy;
  }

  setPolicy(policy: SecurityPolicy): void {
    this.policy = policy;
  }
}

/**
 * Reads a JSON policy document on every call, so edits take effect without a restart
 */
export class FilePolicySource implements PolicySource {
  constructor(private readonly filePath: string) {}

  async getPolicy(): Promise<SecurityPolicy> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      throw new PolicyConfigError(`cannot read ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`, {
        path: this.filePath,
      });
    }

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw new PolicyConfigError(`${this.filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, {
        path: this.filePath,
      });
    }
    return parsePolicy(document);
  }
}
