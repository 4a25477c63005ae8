/**
 * Copyright 2025 Mike Odnis
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import { describe, expect, it } from "vitest";
import { Circle, CompoundGraphic, Dot, type Graphic } from "./composite";
import { CyclicCompositionError, OwnershipConflictError } from "./errors";

class RecordingGraphic implements Graphic {
	constructor(
		private readonly name: string,
		private readonly log: string[],
	) {}

	move(dx: number, dy: number): void {
		this.log.push(`${this.name}:move(${dx},${dy})`);
	}

	draw(): string[] {
		return [this.name];
	}
}

describe("leaves", () => {
	it("move and draw themselves", () => {
		const dot = new Dot(1, 2);
		dot.move(1, 1);
		expect(dot.draw()).toEqual(["Dot(2, 3)"]);

		const circle = new Circle(5, 3, 10);
		circle.move(1, 1);
		expect(circle.draw()).toEqual(["Circle(6, 4, r=10)"]);
	});
});

describe("CompoundGraphic", () => {
	it("moves every leaf of a depth-3 tree once, in insertion order", () => {
		const log: string[] = [];
		const leaf = (name: string) => new RecordingGraphic(name, log);

		const tree = new CompoundGraphic(
			leaf("a"),
			new CompoundGraphic(leaf("b"), new CompoundGraphic(leaf("c"), leaf("d"))),
			leaf("e"),
		);
		tree.move(2, -1);

		expect(log).toEqual([
			"a:move(2,-1)",
			"b:move(2,-1)",
			"c:move(2,-1)",
			"d:move(2,-1)",
			"e:move(2,-1)",
		]);
		expect(tree.draw()).toEqual(["a", "b", "c", "d", "e"]);
	});

	it("moves real shapes through nested groups", () => {
		const dot = new Dot(1, 2);
		const circle = new Circle(5, 3, 10);
		const all = new CompoundGraphic(dot, new CompoundGraphic(circle));

		all.move(1, 1);
		expect(all.draw()).toEqual(["Dot(2, 3)", "Circle(6, 4, r=10)"]);
	});

	it("treats an empty group as a no-op", () => {
		const empty = new CompoundGraphic();
		expect(() => empty.move(3, 3)).not.toThrow();
		expect(empty.draw()).toEqual([]);
	});

	it("supports add and remove", () => {
		const group = new CompoundGraphic();
		const dot = new Dot(0, 0);
		const other = new Dot(9, 9);

		expect(group.add(dot, other)).toBe(group);
		expect(group.children).toEqual([dot, other]);
		expect(group.remove(dot)).toBe(true);
		expect(group.remove(dot)).toBe(false);
		expect(group.children).toEqual([other]);
	});

	it("does not expose its internal child list", () => {
		const group = new CompoundGraphic(new Dot(0, 0));
		const snapshot = group.children;
		group.add(new Dot(1, 1));
		expect(snapshot).toHaveLength(1);
		expect(group.children).toHaveLength(2);
	});

	it("reports nested membership", () => {
		const dot = new Dot(0, 0);
		const inner = new CompoundGraphic(dot);
		const outer = new CompoundGraphic(inner);
		expect(outer.contains(dot)).toBe(true);
		expect(inner.contains(outer)).toBe(false);
	});
});

describe("cycle prevention", () => {
	it("rejects adding a group to itself", () => {
		const group = new CompoundGraphic();
		expect(() => group.add(group)).toThrow(CyclicCompositionError);
	});

	it("rejects adding an ancestor", () => {
		const c = new CompoundGraphic();
		const b = new CompoundGraphic(c);
		const a = new CompoundGraphic(b);

		expect(() => c.add(a)).toThrow(CyclicCompositionError);
		expect(() => c.add(b)).toThrow(CyclicCompositionError);
		expect(c.children).toEqual([]);
	});

	it("rejects the whole batch when one child is invalid", () => {
		const group = new CompoundGraphic();
		expect(() => group.add(new Dot(0, 0), group)).toThrow(CyclicCompositionError);
		expect(group.children).toEqual([]);
	});
});

describe("ownership", () => {
	it("rejects a child that already has a parent", () => {
		const dot = new Dot(0, 0);
		const first = new CompoundGraphic(dot);
		const second = new CompoundGraphic();

		expect(() => second.add(dot)).toThrow(OwnershipConflictError);
		expect(() => first.add(dot)).toThrow(OwnershipConflictError);
	});

	it("rejects the same child twice in one call", () => {
		const dot = new Dot(0, 0);
		expect(() => new CompoundGraphic(dot, dot)).toThrow(OwnershipConflictError);
	});

	it("allows re-adding after removal", () => {
		const dot = new Dot(0, 0);
		const first = new CompoundGraphic(dot);
		const second = new CompoundGraphic();

		first.remove(dot);
		second.add(dot);
		expect(second.children).toEqual([dot]);
	});
});
