import { describe, test, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { TemplateRenderer, listVariables } from "../../src/core/registry/templating.js";
import {
	ConfigurationError,
	UndefinedVariableError,
} from "../../src/core/shared/errors.js";

const envFile = fileURLToPath(new URL("../fixtures/templating.env", import.meta.url));

describe("TemplateRenderer", () => {
	test("replaces placeholders with variables", () => {
		const renderer = new TemplateRenderer({ variables: { SCHEMA: "raw" }, env: {} });

		expect(renderer.render("select * from {{ SCHEMA }}.events join {{SCHEMA}}.users")).toBe(
			"select * from raw.events join raw.users",
		);
	});

	test("leaves text without placeholders unchanged", () => {
		const renderer = new TemplateRenderer({ env: {} });
		expect(renderer.render("select 1")).toBe("select 1");
	});

	test("substitutes empty values", () => {
		const renderer = new TemplateRenderer({ variables: { SUFFIX: "" }, env: {} });
		expect(renderer.render("orders{{ SUFFIX }}")).toBe("orders");
	});

	test("variables win over env, env over the env file, the file over defaults", () => {
		const renderer = new TemplateRenderer({
			variables: { STATUS: "from-variables" },
			env: { STATUS: "from-env", REGION: "env-region" },
			envFile,
			defaults: { STATUS: "from-defaults", LIMIT: "10" },
		});

		expect(renderer.resolve("STATUS")).toBe("from-variables");
		expect(renderer.resolve("REGION")).toBe("env-region");
		expect(renderer.resolve("LIMIT")).toBe("10");
		expect(renderer.resolve("MISSING")).toBeUndefined();
	});

	test("reads the env file when the environment has no value", () => {
		const renderer = new TemplateRenderer({
			env: {},
			envFile,
			defaults: { REGION: "from-defaults" },
		});

		expect(renderer.resolve("REGION")).toBe("from-file");
		expect(renderer.resolve("STATUS")).toBe("file-status");
	});

	test("does not write the env file into the environment", () => {
		const env: Record<string, string | undefined> = {};
		new TemplateRenderer({ env, envFile });
		expect(env).toEqual({});
	});

	test("throws UndefinedVariableError for an unresolved placeholder", () => {
		const renderer = new TemplateRenderer({ env: {} });

		expect(() => renderer.render("select * from {{ TABLE_NAME }}", "a.sql")).toThrow(
			UndefinedVariableError,
		);
		try {
			renderer.render("select * from {{ TABLE_NAME }}", "a.sql");
		} catch (error) {
			expect(error).toBeInstanceOf(UndefinedVariableError);
			if (error instanceof UndefinedVariableError) {
				expect(error.variable).toBe("TABLE_NAME");
				expect(error.origin).toBe("a.sql");
			}
		}
	});

	test("throws ConfigurationError for a missing env file", () => {
		expect(
			() => new TemplateRenderer({ env: {}, envFile: "/nonexistent/sqldag-test.env" }),
		).toThrow(ConfigurationError);
	});
});

describe("listVariables", () => {
	test("lists placeholders once, in order of first use", () => {
		expect(listVariables("{{A}} {{ B }} {{A}}")).toEqual(["A", "B"]);
	});

	test("returns an empty list for plain text", () => {
		expect(listVariables("select 1")).toEqual([]);
	});
});
