/**
 * Unit tests for the local Cypher validator
 */

import { describe, test, expect } from "vitest";
import { validateCypher } from "../../../src/query/cypher-validator.js";
import { SchemaVocabulary } from "../../../src/graph/schema/snapshot.js";
import { companySchema } from "../../helpers/fakes.js";

const vocabulary = new SchemaVocabulary(companySchema());

function check(query: string): ReturnType<typeof validateCypher> {
  return validateCypher(query, vocabulary);
}

describe("validateCypher", () => {
  describe("accepted reads", () => {
    test("collects references from a pattern with filters", () => {
      const result = check(
        "MATCH (e:Employee)-[:WORKS_IN]->(d:Department) WHERE d.name = 'Engineering' RETURN e.name, e.title"
      );

      expect(result.valid).toBe(true);
      expect(result.issues).toEqual([]);
      expect(result.references).toEqual({
        labels: ["Employee", "Department"],
        relationshipTypes: ["WORKS_IN"],
        properties: ["name", "title"],
      });
    });

    test("resolves relationship variables to their type", () => {
      expect(check("MATCH (e:Employee)-[a:ASSIGNED_TO]->(p:Project) RETURN a.role, p.status").valid).toBe(true);
    });

    test("accepts keywords in any case", () => {
      expect(check("match (e:Employee) return e.name").valid).toBe(true);
    });

    test("skips comments and string contents", () => {
      expect(check("MATCH (d:Department) // CREATE something\nWHERE d.name = 'SET x' RETURN d.name").valid).toBe(
        true
      );
    });

    test("treats function calls as calls", () => {
      expect(check("MATCH (e:Employee) RETURN count(e) AS headcount, toUpper(e.name) AS upper").valid).toBe(true);
    });

    test("checks map projections and inline property maps", () => {
      expect(check("MATCH (e:Employee) RETURN e {.name, .salary}").valid).toBe(true);
      expect(check("MATCH (d:Department {name: 'Sales'}) RETURN d").valid).toBe(true);
    });

    test("allows existential subqueries", () => {
      expect(
        check("MATCH (e:Employee) WHERE EXISTS { MATCH (e)-[:WORKS_IN]->(:Department) } RETURN e.name").valid
      ).toBe(true);
    });

    test("accepts label alternatives", () => {
      const result = check("MATCH (n:Employee|Client) RETURN n.name");

      expect(result.valid).toBe(true);
      expect(result.references.labels).toEqual(["Employee", "Client"]);
    });

    test("tolerates one trailing semicolon", () => {
      expect(check("MATCH (e:Employee) RETURN e;").issues).toEqual([]);
    });
  });

  describe("schema checks", () => {
    test("reports unknown labels, types and properties with their variables", () => {
      const result = check("MATCH (e:Employee)-[:MANAGES]->(m:Manager) RETURN e.nickname");

      expect(result.valid).toBe(false);
      expect(result.issues).toEqual([]);
      expect(result.unknownElements).toEqual([
        { kind: "label", name: "Manager", owner: "m" },
        { kind: "relationship", name: "MANAGES", owner: undefined },
        { kind: "property", name: "nickname", owner: "e" },
      ]);
    });

    test("checks properties against the label they are read from", () => {
      expect(check("MATCH (d:Department) RETURN d.salary").unknownElements).toEqual([
        { kind: "property", name: "salary", owner: "d" },
      ]);
    });

    test("checks projected and inline map keys", () => {
      expect(check("MATCH (e:Employee) RETURN e {.name, .nickname}").unknownElements).toEqual([
        { kind: "property", name: "nickname", owner: "e" },
      ]);
      expect(check("MATCH (d:Department {region: 'EU'}) RETURN d").unknownElements).toEqual([
        { kind: "property", name: "region", owner: undefined },
      ]);
    });
  });

  describe("rejected statements", () => {
    test("rejects write clauses", () => {
      expect(check("MATCH (e:Employee) SET e.salary = 0 RETURN e").issues).toEqual([
        "Write clause not allowed: SET",
      ]);
      expect(check("MATCH (e:Employee) DETACH DELETE e RETURN e").issues).toEqual([
        "Write clause not allowed: DETACH",
        "Write clause not allowed: DELETE",
      ]);
    });

    test("rejects statements that do not start with a read clause", () => {
      expect(check("CREATE (n:Employee {name: 'x'}) RETURN n").issues).toEqual([
        "Query must begin with a read clause (MATCH, OPTIONAL MATCH, WITH, UNWIND or RETURN)",
        "Write clause not allowed: CREATE",
      ]);
      expect(check("LOAD CSV FROM 'file:///x.csv' AS row RETURN row").issues).toEqual([
        "Query must begin with a read clause (MATCH, OPTIONAL MATCH, WITH, UNWIND or RETURN)",
        "Write clause not allowed: LOAD CSV",
      ]);
    });

    test("rejects procedure calls", () => {
      expect(check("CALL db.labels() YIELD label RETURN label").issues).toEqual(["Procedure calls are not allowed"]);
    });

    test("reports unbalanced brackets", () => {
      expect(check("MATCH (e:Employee RETURN e").issues).toEqual([
        "Unbalanced brackets: unclosed '('",
        "Query has no RETURN clause",
      ]);
      expect(check("MATCH (e:Employee)) RETURN e").issues).toEqual(["Unbalanced brackets: unexpected ')'"]);
    });

    test("rejects a missing RETURN", () => {
      expect(check("MATCH (e:Employee) WITH e").issues).toEqual(["Query has no RETURN clause"]);
    });

    test("rejects multiple statements", () => {
      expect(check("MATCH (e:Employee) RETURN e; MATCH (d:Department) RETURN d").issues).toEqual([
        "Multiple statements are not allowed",
      ]);
    });

    test("stops at an unterminated string", () => {
      const result = check("MATCH (e:Employee) WHERE e.name = 'Ada RETURN e");

      expect(result.issues).toEqual(["Unterminated string literal"]);
      expect(result.unknownElements).toEqual([]);
    });

    test("rejects an empty statement", () => {
      expect(check("   ").issues).toEqual(["Query is empty", "Query has no RETURN clause"]);
    });
  });
});
