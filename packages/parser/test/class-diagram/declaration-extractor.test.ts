import { beforeEach, describe, expect, it } from "vitest";
import { DeclarationExtractor } from "../../src/class-diagram/declaration-extractor";

describe("DeclarationExtractor", () => {
    let extractor: DeclarationExtractor;

    beforeEach(() => {
        extractor = new DeclarationExtractor();
    });

    describe("Feature: Declaration Kinds", () => {
        it("should extract a plain class with its raw body", () => {
            const result = extractor.extract("class Course {\n  - title: String\n}");

            const course = result.declarations.get("Course");
            expect(course?.kind).toBe("class");
            expect(course?.rawBody).toBe("\n  - title: String\n");
            expect(course?.attributes).toEqual([]);
            expect(course?.methods).toEqual([]);
        });

        it("should tag a class preceded by abstract as abstract_class", () => {
            const result = extractor.extract("abstract class Person {\n}");

            expect(result.declarations.get("Person")?.kind).toBe("abstract_class");
        });

        it("should extract interfaces", () => {
            const result = extractor.extract("interface Payable {\n  + pay(): void\n}");

            expect(result.declarations.get("Payable")?.kind).toBe("interface");
        });

        it("should accept an opening brace on the next line", () => {
            const result = extractor.extract("class Room\n{\n  - number: int\n}");

            expect(result.declarations.get("Room")?.rawBody).toBe("\n  - number: int\n");
        });

        it("should record the header line", () => {
            const result = extractor.extract("@startuml\n\nclass A {\n}\ninterface B {\n}");

            expect(result.declarations.get("A")?.line).toBe(3);
            expect(result.declarations.get("B")?.line).toBe(5);
        });
    });

    describe("Feature: Balanced Bodies", () => {
        it("should keep inline modifier braces inside the body", () => {
            const source = "abstract class Person {\n  + {abstract} getAge(): int\n  + getDetails(): String\n}";

            const body = extractor.extract(source).declarations.get("Person")?.rawBody;

            expect(body).toBe("\n  + {abstract} getAge(): int\n  + getDetails(): String\n");
        });

        it("should continue after the closing brace of each body", () => {
            const source = "class A {\n  + {static} make(): A\n}\nclass B {\n}";

            const names = [...extractor.extract(source).declarations.keys()];

            expect(names).toEqual(["A", "B"]);
        });

        it("should drop a declaration whose body never closes", () => {
            const result = extractor.extract("class Broken {\n  - x: int\n");

            expect(result.declarations.size).toBe(0);
        });

        it("should still find later declarations after an unclosed one", () => {
            const source = "class Broken {\n  - x: int\nclass Fine {\n  - y: int\n}";

            const result = extractor.extract(source);

            expect([...result.declarations.keys()]).toEqual(["Fine"]);
        });

        it("should ignore a class keyword without a body", () => {
            const result = extractor.extract("class Loose\nclass Kept {\n}");

            expect([...result.declarations.keys()]).toEqual(["Kept"]);
        });

        it("should return an empty table for text without declarations", () => {
            const result = extractor.extract("@startuml\nA <|-- B\n@enduml");

            expect(result.declarations.size).toBe(0);
            expect(result.duplicates).toEqual([]);
            expect(result.headerEdges).toEqual([]);
        });
    });

    describe("Feature: Duplicate Names", () => {
        it("should let the later declaration win and report the name", () => {
            const source = "class Item {\n  - a: int\n}\ninterface Item {\n  + b(): void\n}";

            const result = extractor.extract(source);

            expect(result.declarations.size).toBe(1);
            expect(result.declarations.get("Item")?.kind).toBe("interface");
            expect(result.declarations.get("Item")?.rawBody).toBe("\n  + b(): void\n");
            expect(result.duplicates).toEqual(["Item"]);
        });

        it("should let a later class replace an earlier interface of the same name", () => {
            const source = "interface Shape {\n  + area(): double\n}\nclass Shape {\n  - sides: int\n}";

            const result = extractor.extract(source);

            expect(result.declarations.get("Shape")?.kind).toBe("class");
            expect(result.declarations.get("Shape")?.rawBody).toBe("\n  - sides: int\n");
            expect(result.duplicates).toEqual(["Shape"]);
        });

        it("should keep the first insertion position when overwriting", () => {
            const source = "class A {\n}\nclass B {\n}\nabstract class A {\n}";

            const result = extractor.extract(source);

            expect([...result.declarations.keys()]).toEqual(["A", "B"]);
            expect(result.declarations.get("A")?.kind).toBe("abstract_class");
        });
    });

    describe("Feature: Header Clauses", () => {
        it("should collect extends and implements edges from the header", () => {
            const result = extractor.extract("class Professor extends Person implements Payable, Teacher {\n}");

            expect(result.headerEdges).toEqual([
                { kind: "extends", source: "Professor", target: "Person", offset: 0 },
                { kind: "implements", source: "Professor", target: "Payable", offset: 0 },
                { kind: "implements", source: "Professor", target: "Teacher", offset: 0 },
            ]);
        });

        it("should discard header edges of an overwritten declaration", () => {
            const source = "class A extends B {\n}\nclass A {\n}";

            expect(extractor.extract(source).headerEdges).toEqual([]);
        });
    });
});
