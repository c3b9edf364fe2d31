export const parseSkills = (raw: string): string[] => {
  const seen = new Set<string>();
  const skills: string[] = [];

  for (const token of raw.split(",")) {
    const skill = token.trim();
    const key = skill.toLowerCase();

    if (!skill || seen.has(key)) {
      continue;
    }

    seen.add(key);
    skills.push(skill);
  }

  return skills;
};

export const normalizeSkill = (skill: string): string => skill.trim().toLowerCase();
