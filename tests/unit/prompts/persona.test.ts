import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ConfigError } from "../../../src/config";
import { defaultPersona, loadPersona, makeSystemPrompt } from "../../../src/prompts/persona";

describe("loadPersona", () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "persona-"));
    fs.writeFileSync(
      path.join(dir, "characters.json"),
      JSON.stringify({
        aliases: { linae: "Lynae" },
        characters: { Lynae: { prompt_block: "Name: Lynae\nA cheerful botanist." } },
      })
    );
    fs.writeFileSync(path.join(dir, "broken.json"), "{ not json");
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads a character's prompt block", () => {
    const persona = loadPersona(path.join(dir, "characters.json"), "Lynae");
    expect(persona).toEqual({
      id: "lynae",
      characterName: "Lynae",
      systemPrompt: makeSystemPrompt("Name: Lynae\nA cheerful botanist."),
    });
  });

  it("resolves aliases case-insensitively", () => {
    expect(loadPersona(path.join(dir, "characters.json"), "LINAE").characterName).toBe("Lynae");
  });

  it("uses the default persona when the file is missing", () => {
    expect(loadPersona(path.join(dir, "absent.json"), "Rook")).toEqual(defaultPersona("Rook"));
  });

  it("rejects unknown characters and unreadable files", () => {
    expect(() => loadPersona(path.join(dir, "characters.json"), "Rook")).toThrow(ConfigError);
    expect(() => loadPersona(path.join(dir, "broken.json"), "Lynae")).toThrow(ConfigError);
  });

  it("ends the system prompt with the character profile", () => {
    expect(makeSystemPrompt("  Name: X  ").endsWith("CHARACTER PROFILE:\nName: X")).toBe(true);
  });
});
