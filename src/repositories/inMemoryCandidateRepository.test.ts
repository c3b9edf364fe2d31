import { describe, expect, it } from "vitest";
import { NotFoundError } from "../domain/errors";
import type { CandidateFields } from "../domain/model";
import { InMemoryCandidateRepository } from "./inMemoryCandidateRepository";

const fields = (fullName: string): CandidateFields => ({
  fullName,
  dateOfBirth: "1990-06-15",
  contactNumber: "5550100",
  address: "1 Test Road",
  qualification: "MSc",
  graduationYear: 2015,
  yearsOfExperience: 4,
  skills: ["TypeScript"]
});

describe("InMemoryCandidateRepository", () => {
  it("assigns ids starting at 1 and stamps createdAt", async () => {
    const repository = new InMemoryCandidateRepository();
    const created = await repository.create(fields("First"), "cv.pdf", "uploads/cv.pdf");

    expect(created.id).toBe(1);
    expect(created).toMatchObject({ fullName: "First", resumeFilename: "cv.pdf", resumePath: "uploads/cv.pdf" });
    expect(Number.isNaN(Date.parse(created.createdAt))).toBe(false);
  });

  it("never reuses an id after deletion", async () => {
    const repository = new InMemoryCandidateRepository();
    await repository.create(fields("One"), "a.pdf", "uploads/a.pdf");
    const second = await repository.create(fields("Two"), "b.pdf", "uploads/b.pdf");

    await repository.delete(second.id);
    const third = await repository.create(fields("Three"), "c.pdf", "uploads/c.pdf");

    expect(third.id).toBe(3);
  });

  it("gives concurrent creations distinct, increasing ids", async () => {
    const repository = new InMemoryCandidateRepository();
    const created = await Promise.all(
      Array.from({ length: 20 }, (_, index) => repository.create(fields(`C${index}`), "cv.pdf", `uploads/${index}.pdf`))
    );

    expect(created.map((candidate) => candidate.id)).toEqual(Array.from({ length: 20 }, (_, index) => index + 1));
  });

  it("lists records in ascending id order", async () => {
    const repository = new InMemoryCandidateRepository();
    await repository.create(fields("One"), "a.pdf", "uploads/a.pdf");
    await repository.create(fields("Two"), "b.pdf", "uploads/b.pdf");
    await repository.create(fields("Three"), "c.pdf", "uploads/c.pdf");
    await repository.delete(2);

    expect((await repository.list()).map((candidate) => candidate.fullName)).toEqual(["One", "Three"]);
  });

  it("returns the resume path on delete and forgets the record", async () => {
    const repository = new InMemoryCandidateRepository();
    const created = await repository.create(fields("One"), "a.pdf", "uploads/a.pdf");

    await expect(repository.delete(created.id)).resolves.toBe("uploads/a.pdf");
    await expect(repository.get(created.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("signals NotFoundError for unknown ids", async () => {
    const repository = new InMemoryCandidateRepository();

    await expect(repository.get(7)).rejects.toThrow("Candidate 7 was not found.");
    await expect(repository.delete(7)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("hands out copies so callers cannot rewrite stored records", async () => {
    const repository = new InMemoryCandidateRepository();
    const created = await repository.create(fields("One"), "a.pdf", "uploads/a.pdf");

    created.id = 99;
    (await repository.get(1)).skills.push("Injected");
    (await repository.list())[0].fullName = "Renamed";

    expect(await repository.list()).toMatchObject([{ id: 1, fullName: "One", skills: ["TypeScript"] }]);
  });

  it("keeps its own copy of the skills list", async () => {
    const repository = new InMemoryCandidateRepository();
    const input = fields("One");
    await repository.create(input, "a.pdf", "uploads/a.pdf");
    input.skills.push("Mutated");

    expect((await repository.get(1)).skills).toEqual(["TypeScript"]);
  });
});
