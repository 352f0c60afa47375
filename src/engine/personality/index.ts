export { buildPersonalityInputs, classifyPersonality } from "./classifier.js";
export { fallbackPersonalityRule, personalityRules, type PersonalityRule } from "./rules.js";
