import { Skill } from "../shared/types/skill.types";

/** Insertion-ordered set of skills keyed by id; surface forms are merged on re-add. */
export class SkillSet {
  private readonly byId = new Map<string, { skill: Skill; surfaces: string[] }>();

  constructor(skills: Iterable<Skill> = []) {
    for (const skill of skills) {
      this.add(skill);
    }
  }

  add(skill: Skill): void {
    const existing = this.byId.get(skill.id);
    if (!existing) {
      this.byId.set(skill.id, { skill, surfaces: [...skill.surface_forms] });
      return;
    }
    for (const surface of skill.surface_forms) {
      if (!existing.surfaces.includes(surface)) {
        existing.surfaces.push(surface);
      }
    }
  }

  addAll(skills: Iterable<Skill>): void {
    for (const skill of skills) {
      this.add(skill);
    }
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  get size(): number {
    return this.byId.size;
  }

  toArray(): Skill[] {
    return Array.from(this.byId.values(), ({ skill, surfaces }) => freezeSkill({ ...skill, surface_forms: surfaces }));
  }
}

export function freezeSkill(skill: Skill): Skill {
  return Object.freeze({ ...skill, surface_forms: Object.freeze([...skill.surface_forms]) });
}

export function skillIds(skills: ReadonlyArray<Skill>): Set<string> {
  return new Set(skills.map((skill) => skill.id));
}
