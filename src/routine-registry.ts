import { isRoutine, type Routine } from "./routine.js";
import { UnitNotFoundError, ValidationError } from "./core/shared/errors.js";
import type { UnitDefinition } from "./types.js";

/**
 * Routines registered by unit name, for embedding sqldag without a
 * definitions directory of JavaScript files
 */
export class RoutineRegistry {
	private readonly routines = new Map<string, Routine>();

	register(name: string, routine: Routine): void {
		if (this.routines.has(name)) {
			throw new ValidationError(
				`Routine "${name}" is already registered`,
				"routines",
				{ name },
			);
		}
		if (!isRoutine(routine)) {
			throw new ValidationError(
				`Routine "${name}" must implement run(context)`,
				"routines",
				{ name },
			);
		}
		this.routines.set(name, routine);
	}

	get(name: string): Routine {
		const routine = this.routines.get(name);
		if (!routine) {
			throw new UnitNotFoundError(name, this.list());
		}
		return routine;
	}

	has(name: string): boolean {
		return this.routines.has(name);
	}

	list(): string[] {
		return Array.from(this.routines.keys());
	}

	/**
	 * Definitions for every registered routine, labelled by name
	 */
	toDefinitions(): UnitDefinition[] {
		return Array.from(this.routines, ([name, routine]) => ({
			kind: "routine" as const,
			label: name,
			routine,
		}));
	}

	static from(routines: Record<string, Routine>): RoutineRegistry {
		const registry = new RoutineRegistry();
		for (const [name, routine] of Object.entries(routines)) {
			registry.register(name, routine);
		}
		return registry;
	}
}
