import { Skill, SkillCategory } from "../shared/types/skill.types";

const LEARNING_TEMPLATES: Record<SkillCategory, (name: string) => string> = {
  language: (name) =>
    `Build a small project in ${name}, publish it, and link it from your CV so the skill is backed by code.`,
  tool: (name) =>
    `Work through the official ${name} getting-started guide and use it in a side project you can describe in your experience section.`,
  certification: (name) =>
    `Review the ${name} exam requirements and list the certification as "in progress" once you are enrolled.`,
  soft_skill: (name) =>
    `Pick one concrete situation where you showed ${name.toLowerCase()} and describe it together with its outcome.`,
  unknown: (name) =>
    `Consider a short online course on ${name}, or state your willingness to learn it if you have no hands-on experience yet.`,
};

export function learningSuggestion(skill: Skill): string {
  return LEARNING_TEMPLATES[skill.category](skill.name);
}
