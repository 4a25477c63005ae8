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

export interface Cloneable<T> {
	clone(): T;
}

// Fields every shape carries; embedded rather than inherited
export interface ShapeCommon {
	x?: number;
	y?: number;
	color?: string;
}

export type ShapeKind = "rectangle" | "circle";

export interface Shape extends Cloneable<Shape> {
	readonly kind: ShapeKind;
	x?: number;
	y?: number;
	color?: string;
	equals(other: Shape): boolean;
}

const copyCommon = (source: ShapeCommon): ShapeCommon => ({
	x: source.x,
	y: source.y,
	color: source.color,
});

const sameCommon = (a: ShapeCommon, b: ShapeCommon): boolean =>
	Object.is(a.x, b.x) && Object.is(a.y, b.y) && a.color === b.color;

/**
 * Shared accessors over the embedded {@link ShapeCommon} record.
 */
abstract class ShapeFields {
	protected readonly common: ShapeCommon;

	protected constructor(common: ShapeCommon) {
		this.common = copyCommon(common);
	}

	get x(): number | undefined {
		return this.common.x;
	}
	set x(value: number | undefined) {
		this.common.x = value;
	}

	get y(): number | undefined {
		return this.common.y;
	}
	set y(value: number | undefined) {
		this.common.y = value;
	}

	get color(): string | undefined {
		return this.common.color;
	}
	set color(value: string | undefined) {
		this.common.color = value;
	}
}

export interface RectangleInit extends ShapeCommon {
	width?: number;
	height?: number;
}

export class Rectangle extends ShapeFields implements Shape {
	readonly kind = "rectangle";
	width?: number;
	height?: number;

	/** Pass another rectangle to copy it: common fields first, then width and height. */
	constructor(source: Rectangle | RectangleInit = {}) {
		super(source instanceof Rectangle ? source.common : source);
		this.width = source.width;
		this.height = source.height;
	}

	clone(): Rectangle {
		return new Rectangle(this);
	}

	equals(other: Shape): boolean {
		return (
			other instanceof Rectangle &&
			sameCommon(this.common, other.common) &&
			Object.is(this.width, other.width) &&
			Object.is(this.height, other.height)
		);
	}
}

export interface CircleInit extends ShapeCommon {
	radius?: number;
}

export class Circle extends ShapeFields implements Shape {
	readonly kind = "circle";
	radius?: number;

	constructor(source: Circle | CircleInit = {}) {
		super(source instanceof Circle ? source.common : source);
		this.radius = source.radius;
	}

	clone(): Circle {
		return new Circle(this);
	}

	equals(other: Shape): boolean {
		return (
			other instanceof Circle &&
			sameCommon(this.common, other.common) &&
			Object.is(this.radius, other.radius)
		);
	}
}

// Each element is cloned through its own variant, never by the caller
export const cloneAll = (shapes: readonly Shape[]): Shape[] =>
	shapes.map((shape) => shape.clone());
