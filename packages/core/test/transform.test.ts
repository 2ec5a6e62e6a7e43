import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { generateSources, parseDiagram } from "../src/transform";

const SCHOOL_DIAGRAM = [
    "@startuml",
    "abstract class Person {",
    "  - name: String",
    "}",
    "class Student {",
    "  - id: String",
    "}",
    "interface Enrollable {",
    "  + enroll(course: String): void",
    "}",
    "Person <|-- Student",
    "Student ..|> Enrollable",
    "@enduml",
].join("\n");

const identifier = fc.stringMatching(/^[A-Z][a-z]{0,6}$/);

describe("generateSources", () => {
    describe("Feature: End-to-end Transform", () => {
        it("should render one artifact per declaration in document order", () => {
            const { sources } = generateSources(SCHOOL_DIAGRAM);

            expect([...sources.keys()]).toEqual(["Person", "Student", "Enrollable"]);
        });

        it("should wire extends and implements into the subclass header", () => {
            const { sources } = generateSources(SCHOOL_DIAGRAM);

            const student = sources.get("Student");
            expect(student?.split("\n")[0]).toBe("public class Student extends Person implements Enrollable {");
            expect(student).toContain("    public Student(String name, String id) {\n        super(name);\n");
        });

        it("should pass render options through", () => {
            const { sources } = generateSources(SCHOOL_DIAGRAM, { packageName: "edu.campus", indent: "  " });

            expect(sources.get("Enrollable")).toBe(
                "package edu.campus;\n\npublic interface Enrollable {\n  public void enroll(String course);\n}\n",
            );
        });

        it("should return the parsed model alongside the sources", () => {
            const { model } = generateSources(SCHOOL_DIAGRAM);

            expect(model.relationships.extends.get("Student")).toBe("Person");
            expect(model.relationships.implements.get("Student")).toEqual(["Enrollable"]);
        });

        it("should build fresh tables on every call", () => {
            generateSources("class Leftover {\n}");

            const { sources } = generateSources("class Fresh {\n}");

            expect([...sources.keys()]).toEqual(["Fresh"]);
        });
    });

    describe("Feature: Properties", () => {
        it("should never throw and should key sources by declared name", () => {
            fc.assert(
                fc.property(fc.string(), (text) => {
                    const { sources, model } = generateSources(text);
                    expect([...sources.keys()]).toEqual([...model.declarations.keys()]);
                }),
            );
        });

        it("should yield nothing for text without an opening brace", () => {
            fc.assert(
                fc.property(
                    fc.string().filter((text) => !text.includes("{")),
                    (text) => {
                        expect(generateSources(text).sources.size).toBe(0);
                    },
                ),
            );
        });

        it("should emit one artifact per distinct declared name with its header", () => {
            fc.assert(
                fc.property(fc.uniqueArray(identifier, { minLength: 1, maxLength: 6 }), (names) => {
                    const text = names.map((name) => `class ${name} {\n  - value: int\n}`).join("\n");

                    const { sources } = generateSources(text);

                    expect([...sources.keys()]).toEqual(names);
                    for (const name of names) {
                        expect(sources.get(name)?.split("\n")[0]).toBe(`public class ${name} {`);
                    }
                }),
            );
        });

        it("should give every private attribute exactly one getter and one setter", () => {
            fc.assert(
                fc.property(fc.uniqueArray(fc.stringMatching(/^[a-z][a-zA-Z]{0,8}$/), { maxLength: 5 }), (fields) => {
                    const body = fields.map((field) => `  - ${field}: int`).join("\n");

                    const output = generateSources(`class Holder {\n${body}\n}`).sources.get("Holder") ?? "";

                    const accessors = output.split("\n").filter((line) => /^ {4}public \w+ (get|set)\w+\(/.test(line));
                    expect(accessors).toHaveLength(fields.length * 2);
                }),
            );
        });
    });
});

describe("parseDiagram", () => {
    it("should expose declarations without rendering", () => {
        const model = parseDiagram(SCHOOL_DIAGRAM);

        expect(model.declarations.get("Person")?.kind).toBe("abstract_class");
        expect(model.declarations.get("Enrollable")?.methods.map((m) => m.name)).toEqual(["enroll"]);
        expect(model.duplicates).toEqual([]);
    });
});
