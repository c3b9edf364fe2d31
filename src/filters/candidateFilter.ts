import type { CandidateQuery, CandidateRecord } from "../domain/model";
import { normalizeSkill } from "../domain/skills";

type CandidatePredicate = (record: CandidateRecord) => boolean;

const buildPredicates = (query: CandidateQuery): CandidatePredicate[] => {
  const predicates: CandidatePredicate[] = [];
  const skill = query.skill === undefined ? "" : normalizeSkill(query.skill);

  if (skill) {
    predicates.push((record) => record.skills.some((entry) => normalizeSkill(entry) === skill));
  }

  if (query.minExperience !== undefined) {
    const minExperience = query.minExperience;
    predicates.push((record) => record.yearsOfExperience >= minExperience);
  }

  if (query.graduationYear !== undefined) {
    const graduationYear = query.graduationYear;
    predicates.push((record) => record.graduationYear === graduationYear);
  }

  return predicates;
};

export const filterCandidates = (records: CandidateRecord[], query: CandidateQuery): CandidateRecord[] => {
  const predicates = buildPredicates(query);

  if (predicates.length === 0) {
    return records;
  }

  return records.filter((record) => predicates.every((predicate) => predicate(record)));
};
