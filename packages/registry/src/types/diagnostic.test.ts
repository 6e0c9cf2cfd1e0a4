import { describe, it } from "mocha";
import { expect } from "chai";
import { createDiagnostic, diagnosticKind, formatDiagnostic } from "./diagnostic.js";

describe("Diagnostics", () => {
  it("formats code, message and hint on one line", () => {
    const diagnostic = createDiagnostic(
      "DEF1801",
      "Cannot implicitly cast from 'long' to 'int'",
      "An explicit cast from 'long' to 'int' is available"
    );

    expect(formatDiagnostic(diagnostic)).to.equal(
      "error DEF1801: Cannot implicitly cast from 'long' to 'int' Hint: An explicit cast from 'long' to 'int' is available"
    );
  });

  it("prefixes the source position when there is one", () => {
    const diagnostic = {
      ...createDiagnostic("HOST2005", "Unknown type 'Gizmo' in a member of 'Widget'"),
      location: { file: "widget.d.ts", line: 4 },
    };

    expect(formatDiagnostic(diagnostic)).to.equal(
      "widget.d.ts:4 error HOST2005: Unknown type 'Gizmo' in a member of 'Widget'"
    );
  });

  it("groups codes into kinds", () => {
    expect(diagnosticKind("DEF1001")).to.equal("NameFormatError");
    expect(diagnosticKind("DEF1202")).to.equal("DuplicateStructError");
    expect(diagnosticKind("DEF1606")).to.equal("TypeMismatchError");
    expect(diagnosticKind("DEF1904")).to.equal("NoSuchMemberError");
    expect(diagnosticKind("DEF2105")).to.equal("WhitelistError");
    expect(diagnosticKind("HOST1004")).to.equal("HostDeclarationError");
  });
});
