/**
 * Tests for host declaration loading
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  loadHostCatalog,
  loadHostDeclarationFile,
  standardDeclarationsPath,
} from "./loader.js";

const withTempFiles = <T>(
  files: Readonly<Record<string, string>>,
  run: (paths: readonly string[]) => T
): T => {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "sandscript-test-"));
  try {
    const paths = Object.entries(files).map(([name, content]) => {
      const filePath = path.join(tmpDir, name);
      fs.writeFileSync(filePath, content);
      return filePath;
    });
    return run(paths);
  } finally {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  }
};

describe("Host declaration loader", () => {
  describe("loadHostDeclarationFile", () => {
    it("reports a missing file", () => {
      const result = loadHostDeclarationFile("/nonexistent/host.d.ts");

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("HOST1001");
    });

    it("reads a declaration file", () => {
      const result = withTempFiles(
        { "host.d.ts": "declare class Clock {\n  now(): long;\n}\n" },
        ([filePath]) => loadHostDeclarationFile(filePath ?? "")
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.classes.map((c) => c.name)).to.deep.equal(["Clock"]);
    });
  });

  describe("loadHostCatalog", () => {
    it("links classes across files", () => {
      const result = withTempFiles(
        {
          "base.d.ts": "declare class Object {}\ndeclare abstract class Animal {}\n",
          "dogs.d.ts": "declare class Dog extends Animal {\n  constructor();\n}\n",
        },
        (paths) => loadHostCatalog(paths)
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      const catalog = result.value;
      const dog = catalog.findClass("Dog");
      const animal = catalog.findClass("Animal");
      expect(dog && animal && catalog.isAssignable(animal, dog)).to.equal(true);
    });

    it("reports problems from every file", () => {
      const result = withTempFiles(
        {
          "a.d.ts": "declare function a(): void;\n",
          "b.d.ts": "declare class B {\n  f(): int | long;\n}\n",
        },
        (paths) => loadHostCatalog(paths)
      );

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.map((d) => d.code)).to.deep.equal([
        "HOST1003",
        "HOST1004",
      ]);
    });

    it("loads the standard declarations", () => {
      const result = loadHostCatalog([standardDeclarationsPath]);

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      const catalog = result.value;
      const list = catalog.findClass("List");
      const arrayList = catalog.findClass("ArrayList");
      const charSequence = catalog.findClass("CharSequence");
      const string = catalog.findClass("String");

      expect(list?.kind).to.equal("interface");
      expect(arrayList?.kind).to.equal("class");
      expect(list && arrayList && catalog.isAssignable(list, arrayList)).to.equal(true);
      expect(
        charSequence && string && catalog.isAssignable(charSequence, string)
      ).to.equal(true);
      expect(catalog.findClass("Number")?.abstract).to.equal(true);
    });
  });
});
