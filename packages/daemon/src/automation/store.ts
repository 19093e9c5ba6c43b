import Database from "better-sqlite3";
import { v4 as uuid } from "uuid";
import type { AutomationRule, GlobalSettings } from "@sundial/shared";
import { DEFAULT_SETTINGS, normalizeTrigger } from "@sundial/shared";
import { ConfigurationError, RuleNotFoundError, describeError } from "../engine/errors.js";
import {
  EXPORT_VERSION,
  exportSchema,
  parameterMapSchema,
  ruleInputSchema,
  settingsSchema,
  triggerSchema,
} from "./schema.js";
import type { RuleInput } from "./schema.js";

export interface StoredConfiguration {
  rules: AutomationRule[];
  settings: GlobalSettings;
}

/**
 * SQLite-backed rule and settings store. Unknown rule ids raise
 * RuleNotFoundError; every other storage failure surfaces as ConfigurationError.
 */
export class AutomationRepository {
  private db: Database.Database;

  constructor(
    dbPath: string,
    private clock: () => number = Date.now,
  ) {
    this.db = openDatabase(dbPath);
    this.guard(`initialize ${dbPath}`, () => this.init());
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS automation_rules (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        enabled INTEGER NOT NULL DEFAULT 1,
        trigger_json TEXT NOT NULL,
        capability_id TEXT NOT NULL,
        action TEXT NOT NULL,
        parameters_json TEXT NOT NULL DEFAULT '{}',
        position INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY,
        value_json TEXT NOT NULL
      );
    `);
  }

  // ── Whole Configuration ──

  load(): StoredConfiguration {
    return this.guard("load configuration", () => ({
      rules: this.getAll(),
      settings: this.getSettings(),
    }));
  }

  save(rules: AutomationRule[], settings: GlobalSettings): void {
    this.guard("save configuration", () => {
      this.db.transaction(() => {
        this.db.prepare(`DELETE FROM automation_rules`).run();
        rules.forEach((rule, position) => this.insert(rule, position));
        this.writeSettings(settings);
      })();
    });
  }

  reset(): void {
    this.save([], DEFAULT_SETTINGS);
  }

  // ── Rules ──

  getAll(): AutomationRule[] {
    const rows = this.db
      .prepare<[], RuleRow>(`SELECT * FROM automation_rules ORDER BY position ASC, created_at ASC`)
      .all();
    return rows.map((r) => this.rowToRule(r));
  }

  get(id: string): AutomationRule | undefined {
    const row = this.db
      .prepare<[string], RuleRow>(`SELECT * FROM automation_rules WHERE id = ?`)
      .get(id);
    return row ? this.rowToRule(row) : undefined;
  }

  /** Builds a rule with a fresh id from user input and stores it. */
  create(input: RuleInput): AutomationRule {
    return this.guard("create rule", () => {
      const parsed = ruleInputSchema.parse(input);
      const now = this.clock();
      return this.addRule({
        ...parsed,
        id: uuid(),
        trigger: normalizeTrigger(parsed.trigger),
        createdAt: now,
        updatedAt: now,
      });
    });
  }

  addRule(rule: AutomationRule): AutomationRule {
    return this.guard("add rule", () => {
      const position = this.db
        .prepare<[], { next: number }>(`SELECT COALESCE(MAX(position) + 1, 0) AS next FROM automation_rules`)
        .get();
      this.insert(rule, position?.next ?? 0);
      return rule;
    });
  }

  /** Replaces a stored rule; `updatedAt` is stamped here and always moves forward. */
  updateRule(rule: AutomationRule): AutomationRule {
    return this.guard("update rule", () => {
      const existing = this.get(rule.id);
      if (!existing) throw new RuleNotFoundError(rule.id);

      const updated: AutomationRule = {
        ...rule,
        createdAt: existing.createdAt,
        updatedAt: this.stamp(existing.updatedAt),
      };
      this.db
        .prepare(
          `UPDATE automation_rules SET name = ?, description = ?, enabled = ?, trigger_json = ?, capability_id = ?, action = ?, parameters_json = ?, updated_at = ? WHERE id = ?`,
        )
        .run(
          updated.name,
          updated.description,
          updated.enabled ? 1 : 0,
          JSON.stringify(updated.trigger),
          updated.capabilityId,
          updated.action,
          JSON.stringify(updated.parameters),
          updated.updatedAt,
          updated.id,
        );
      return updated;
    });
  }

  deleteRule(id: string): void {
    this.guard("delete rule", () => {
      const result = this.db.prepare(`DELETE FROM automation_rules WHERE id = ?`).run(id);
      if (result.changes === 0) throw new RuleNotFoundError(id);
    });
  }

  toggleRule(id: string): AutomationRule {
    const existing = this.get(id);
    if (!existing) throw new RuleNotFoundError(id);
    return this.updateRule({ ...existing, enabled: !existing.enabled });
  }

  rulesForCapability(capabilityId: string): AutomationRule[] {
    return this.getAll().filter((r) => r.capabilityId === capabilityId);
  }

  enabledRules(): AutomationRule[] {
    return this.getAll().filter((r) => r.enabled);
  }

  // ── Settings ──

  getSettings(): GlobalSettings {
    const row = this.db
      .prepare<[string], { value_json: string }>(`SELECT value_json FROM settings WHERE key = ?`)
      .get("global");
    if (!row) return { ...DEFAULT_SETTINGS };
    return settingsSchema.parse(JSON.parse(row.value_json));
  }

  updateSettings(changes: Partial<GlobalSettings>): GlobalSettings {
    return this.guard("update settings", () => {
      const merged = settingsSchema.parse({ ...this.getSettings(), ...changes });
      this.writeSettings(merged);
      return merged;
    });
  }

  // ── Export / Import ──

  exportConfiguration(): string {
    const { rules, settings } = this.load();
    return JSON.stringify(
      {
        version: EXPORT_VERSION,
        exportedAt: new Date(this.clock()).toISOString(),
        rules,
        settings,
      },
      null,
      2,
    );
  }

  /** Replaces everything with the exported document; on any failure nothing changes. */
  importConfiguration(json: string): StoredConfiguration {
    let document: unknown;
    try {
      document = JSON.parse(json);
    } catch (err) {
      throw new ConfigurationError(`Import is not valid JSON: ${describeError(err)}`, { cause: err });
    }

    const result = exportSchema.safeParse(document);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
      throw new ConfigurationError(`Import rejected: ${issues.join("; ")}`);
    }

    const ids = new Set<string>();
    for (const rule of result.data.rules) {
      if (ids.has(rule.id)) throw new ConfigurationError(`Import rejected: duplicate rule id ${rule.id}`);
      ids.add(rule.id);
    }

    const rules = result.data.rules.map((r) => ({ ...r, trigger: normalizeTrigger(r.trigger) }));
    this.save(rules, result.data.settings);
    return { rules, settings: result.data.settings };
  }

  close(): void {
    this.db.close();
  }

  // ── Helpers ──

  private stamp(previous: number): number {
    const now = this.clock();
    return now > previous ? now : previous + 1;
  }

  private insert(rule: AutomationRule, position: number): void {
    this.db
      .prepare(
        `INSERT INTO automation_rules (id, name, description, enabled, trigger_json, capability_id, action, parameters_json, position, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        rule.id,
        rule.name,
        rule.description,
        rule.enabled ? 1 : 0,
        JSON.stringify(rule.trigger),
        rule.capabilityId,
        rule.action,
        JSON.stringify(rule.parameters),
        position,
        rule.createdAt,
        rule.updatedAt,
      );
  }

  private writeSettings(settings: GlobalSettings): void {
    this.db
      .prepare(
        `INSERT INTO settings (key, value_json) VALUES (?, ?)
         ON CONFLICT(key) DO UPDATE SET value_json = excluded.value_json`,
      )
      .run("global", JSON.stringify(settings));
  }

  private guard<T>(what: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof RuleNotFoundError || err instanceof ConfigurationError) throw err;
      throw new ConfigurationError(`Failed to ${what}: ${describeError(err)}`, { cause: err });
    }
  }

  private rowToRule(row: RuleRow): AutomationRule {
    return {
      id: row.id,
      name: row.name,
      description: row.description,
      enabled: row.enabled === 1,
      trigger: normalizeTrigger(triggerSchema.parse(JSON.parse(row.trigger_json))),
      capabilityId: row.capability_id,
      action: row.action,
      parameters: parameterMapSchema.parse(JSON.parse(row.parameters_json)),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

function openDatabase(dbPath: string): Database.Database {
  try {
    const db = new Database(dbPath);
    db.pragma("journal_mode = WAL");
    return db;
  } catch (err) {
    throw new ConfigurationError(`Cannot open database at ${dbPath}: ${describeError(err)}`, { cause: err });
  }
}

interface RuleRow {
  id: string;
  name: string;
  description: string;
  enabled: number;
  trigger_json: string;
  capability_id: string;
  action: string;
  parameters_json: string;
  position: number;
  created_at: number;
  updated_at: number;
}
