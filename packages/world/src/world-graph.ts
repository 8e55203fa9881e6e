import type {
  Effect,
  SceneDefinition,
  SceneOverrideRule,
  WorldDefinition,
} from "@storyloom/schemas";
import { WorldIntegrityError, validateWorldDefinitionData } from "@storyloom/schemas";

export interface Choice {
  readonly choice_id: string;
  readonly description: string;
  readonly result_scene_id: string;
  readonly effects: readonly Effect[];
}

export interface Scene {
  readonly scene_id: string;
  readonly title: string;
  readonly description: string;
  /** Definition order: display order and resolver tie-break order. */
  readonly choices: ReadonlyMap<string, Choice>;
}

/**
 * Collects every referential-integrity problem in a schema-valid definition.
 * An empty list means the world can be played.
 */
export function collectIntegrityIssues(definition: WorldDefinition): string[] {
  const issues: string[] = [];
  const sceneIds = new Set<string>();

  for (const scene of definition.scenes) {
    if (sceneIds.has(scene.scene_id)) {
      issues.push(`duplicate scene "${scene.scene_id}"`);
    }
    sceneIds.add(scene.scene_id);
  }

  if (!sceneIds.has(definition.entry_scene_id)) {
    issues.push(`entry scene "${definition.entry_scene_id}" does not exist`);
  }

  for (const scene of definition.scenes) {
    const choiceIds = new Set<string>();
    for (const choice of scene.choices) {
      if (choiceIds.has(choice.choice_id)) {
        issues.push(`scene "${scene.scene_id}": duplicate choice "${choice.choice_id}"`);
      }
      choiceIds.add(choice.choice_id);
      if (!sceneIds.has(choice.result_scene_id)) {
        issues.push(
          `scene "${scene.scene_id}" choice "${choice.choice_id}": result scene "${choice.result_scene_id}" does not exist`,
        );
      }
    }
  }

  const overrides = definition.overrides ?? [];
  overrides.forEach((rule, i) => {
    if (!sceneIds.has(rule.scene_id)) {
      issues.push(`override #${i}: scene "${rule.scene_id}" does not exist`);
    }
    if (!sceneIds.has(rule.render_as)) {
      issues.push(`override #${i}: render_as scene "${rule.render_as}" does not exist`);
    }
  });

  const cycle = findOverrideCycle(overrides);
  if (cycle) {
    issues.push(`override rules form a cycle: ${cycle.join(" -> ")}`);
  }

  return issues;
}

function findOverrideCycle(overrides: readonly SceneOverrideRule[]): string[] | undefined {
  const edges = new Map<string, string[]>();
  for (const rule of overrides) {
    const targets = edges.get(rule.scene_id) ?? [];
    targets.push(rule.render_as);
    edges.set(rule.scene_id, targets);
  }

  const done = new Set<string>();
  const visit = (node: string, path: string[]): string[] | undefined => {
    const at = path.indexOf(node);
    if (at !== -1) return [...path.slice(at), node];
    if (done.has(node)) return undefined;
    for (const next of edges.get(node) ?? []) {
      const found = visit(next, [...path, node]);
      if (found) return found;
    }
    done.add(node);
    return undefined;
  };

  for (const start of edges.keys()) {
    const found = visit(start, []);
    if (found) return found;
  }
  return undefined;
}

function freezeScene(def: SceneDefinition): Scene {
  const choices = new Map<string, Choice>();
  for (const c of def.choices) {
    choices.set(c.choice_id, Object.freeze({
      choice_id: c.choice_id,
      description: c.description,
      result_scene_id: c.result_scene_id,
      effects: Object.freeze((c.effects ?? []).map((e) => Object.freeze({ ...e }))),
    }));
  }
  return Object.freeze({
    scene_id: def.scene_id,
    title: def.title,
    description: def.description,
    choices,
  });
}

/**
 * The immutable scene graph. Validated once at construction and shared
 * read-only by every session in the process.
 */
export class WorldGraph {
  readonly title: string;
  readonly entrySceneId: string;
  readonly greeting: string | undefined;
  readonly restartText: string | undefined;
  readonly overrides: readonly SceneOverrideRule[];
  private scenes: ReadonlyMap<string, Scene>;

  constructor(definition: WorldDefinition, source?: string) {
    const schema = validateWorldDefinitionData(definition);
    if (!schema.valid) {
      throw new WorldIntegrityError(schema.errors, source);
    }
    const issues = collectIntegrityIssues(definition);
    if (issues.length > 0) {
      throw new WorldIntegrityError(issues, source);
    }

    this.title = definition.title;
    this.entrySceneId = definition.entry_scene_id;
    this.greeting = definition.greeting;
    this.restartText = definition.restart_text;
    this.overrides = Object.freeze(
      (definition.overrides ?? []).map((r) => Object.freeze({ ...r, when: Object.freeze({ ...r.when }) })),
    );
    this.scenes = new Map(definition.scenes.map((s) => [s.scene_id, freezeScene(s)]));
    Object.freeze(this);
  }

  getScene(sceneId: string): Scene | undefined {
    return this.scenes.get(sceneId);
  }

  hasScene(sceneId: string): boolean {
    return this.scenes.has(sceneId);
  }

  requireScene(sceneId: string): Scene {
    const scene = this.scenes.get(sceneId);
    if (!scene) throw new WorldIntegrityError([`scene "${sceneId}" does not exist`]);
    return scene;
  }

  listScenes(): Scene[] {
    return [...this.scenes.values()];
  }

  get sceneCount(): number {
    return this.scenes.size;
  }

  get choiceCount(): number {
    let n = 0;
    for (const scene of this.scenes.values()) n += scene.choices.size;
    return n;
  }
}
