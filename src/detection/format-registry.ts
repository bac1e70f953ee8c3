/**
 * @fileoverview Format Registry
 *
 * JSON-backed catalog of {@link FormatProfile}s. The registry is never empty
 * once constructed: a missing or unreadable backing file falls back to the
 * built-in profiles. Every mutation rewrites the whole file; concurrent
 * writers are not coordinated, so callers must serialize mutations.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { environmentConfig } from "../config/environment";
import { FormatRegistryError, generateCorrelationId, toError } from "../types/errors";
import { createCorrelatedLogger, Logger } from "../utils/logger";
import { FormatProfile, type FormatProfileDict } from "./format-profile";

/**
 * Shape of the registry file
 */
export interface FormatRegistryDocument {
  profiles: FormatProfileDict[];
}

/**
 * Built-in profiles seeded into a new or unreadable registry
 */
export function createDefaultProfiles(): FormatProfile[] {
  const creditCard = new FormatProfile("credit_card_payment", {
    description: "Credit card payment transaction format",
    headerPatterns: {
      transaction_id: ["trans.?\\s*#", "transaction\\s*id", "id"],
      transaction_date: ["trans.?\\s*date", "date"],
      amount: ["gross\\s*amt", "amount", "payment"],
      payment_type: ["acct\\s*type", "card\\s*type", "type"],
      patient_name: ["client\\s*name", "patient", "name"],
      provider_name: ["provider"],
    },
    columnMappings: {
      "Trans. #": "transaction_id",
      "Trans. Date": "transaction_date",
      "Gross Amt": "amount",
      "Acct Type": "payment_type",
      "Client Name": "patient_name",
      Provider: "provider_name",
    },
  });

  const insuranceClaims = new FormatProfile("insurance_claims", {
    description: "Insurance claims payment format",
    headerPatterns: {
      transaction_id: ["row\\s*id", "claim\\s*id", "id"],
      transaction_date: ["check\\s*date", "date"],
      amount: ["check\\s*amount", "amount", "payment"],
      cash_applied: ["cash\\s*applied", "applied\\s*amount"],
      payer_name: ["payment\\s*from", "payer", "insurance"],
      provider_name: ["provider"],
    },
    columnMappings: {
      RowId: "transaction_id",
      "Check Date": "transaction_date",
      "Check Amount": "amount",
      "Cash Applied": "cash_applied",
      "Payment From": "payer_name",
      Provider: "provider_name",
    },
  });

  return [creditCard, insuranceClaims];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export class FormatRegistry {
  readonly registryPath: string;
  private profiles = new Map<string, FormatProfile>();
  private readonly logger: Logger;

  constructor(registryPath: string = environmentConfig.formatRegistryPath) {
    this.registryPath = registryPath;
    this.logger = createCorrelatedLogger(generateCorrelationId(), {
      registryPath,
    });
    this.loadRegistry();
  }

  /**
   * Load profiles from the backing file
   *
   * A missing file is seeded with the defaults and written out. A corrupt
   * one is logged and replaced in memory by the defaults, leaving the file
   * untouched until the next mutation.
   */
  loadRegistry(): void {
    if (!existsSync(this.registryPath)) {
      this.logger.info("Format registry not found, creating new registry", {
        operation: "registry_load",
      });
      this.seedDefaults();
      try {
        this.saveRegistry();
      } catch (error) {
        // Defaults stay usable in memory even when the path is not writable
        this.logger.warn("Could not write new format registry", {
          operation: "registry_load",
          error: toError(error).message,
        });
      }
      return;
    }

    try {
      const document: unknown = JSON.parse(readFileSync(this.registryPath, "utf8"));
      const entries = isRecord(document) && Array.isArray(document.profiles)
        ? document.profiles
        : [];

      const loaded = new Map<string, FormatProfile>();
      for (const entry of entries) {
        const profile = FormatProfile.fromDict(entry);
        loaded.set(profile.name, profile);
      }

      if (loaded.size === 0) {
        throw new FormatRegistryError(
          "Format registry contains no profiles",
          "registry",
          this.registryPath,
          "load",
        );
      }

      this.profiles = loaded;
      this.logger.info(`Loaded ${loaded.size} format profiles from registry`, {
        operation: "registry_load",
        profileCount: loaded.size,
      });
    } catch (error) {
      this.logger.error("Error loading format registry", toError(error), {
        operation: "registry_load",
      });
      this.seedDefaults();
    }
  }

  /**
   * Rewrite the backing file with every profile
   *
   * @throws {FormatRegistryError} When the file cannot be written
   */
  saveRegistry(): void {
    const document: FormatRegistryDocument = {
      profiles: Array.from(this.profiles.values()).map((profile) => profile.toDict()),
    };

    try {
      mkdirSync(dirname(this.registryPath), { recursive: true });
      writeFileSync(this.registryPath, JSON.stringify(document, null, 2), "utf8");
    } catch (error) {
      const cause = toError(error);
      this.logger.error("Error saving format registry", cause, {
        operation: "registry_save",
      });
      throw new FormatRegistryError(
        `Unable to save format registry: ${cause.message}`,
        "registry",
        this.registryPath,
        "save",
      );
    }

    this.logger.info(`Saved ${this.profiles.size} format profiles to registry`, {
      operation: "registry_save",
      profileCount: this.profiles.size,
    });
  }

  /**
   * Add or replace a profile and persist the registry
   */
  addProfile(profile: FormatProfile): void {
    this.profiles.set(profile.name, profile);
    this.saveRegistry();
  }

  getProfile(name: string): FormatProfile | undefined {
    return this.profiles.get(name);
  }

  listProfiles(): string[] {
    return Array.from(this.profiles.keys());
  }

  /**
   * All profiles in registration order
   */
  getProfiles(): FormatProfile[] {
    return Array.from(this.profiles.values());
  }

  private seedDefaults(): void {
    this.profiles = new Map(
      createDefaultProfiles().map((profile) => [profile.name, profile]),
    );
  }
}
