import { describe, expect, it } from "vitest";
import { parseSkills } from "./skills";

describe("parseSkills", () => {
  it("splits on commas and trims each token", () => {
    expect(parseSkills("Python, FastAPI, SQL")).toEqual(["Python", "FastAPI", "SQL"]);
  });

  it("drops empty tokens", () => {
    expect(parseSkills(" , Go,,  ,Rust ,")).toEqual(["Go", "Rust"]);
  });

  it("keeps the first spelling of a repeated skill", () => {
    expect(parseSkills("python, SQL, Python, sql")).toEqual(["python", "SQL"]);
  });

  it("returns nothing for blank input", () => {
    expect(parseSkills("   ")).toEqual([]);
  });
});
