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

import { fileURLToPath } from "node:url";
import { renderUI, uiFactoryFor } from "./abstract-factory";
import { RoundHole, RoundPeg, SquarePeg, SquarePegAdapter } from "./adapter";
import { AdvancedRemote, Radio, Remote, Tv } from "./bridge";
import { BurgerBuilder } from "./builder";
import { Circle, CompoundGraphic, Dot } from "./composite";
import { isPatternError } from "./errors";
import { createButton } from "./factory";
import { Logger, LogLevel } from "./logger";
import { Rectangle } from "./prototype";
import { CachedYouTubeService, YouTubeAPIService } from "./proxy";
import { Database } from "./singleton";

const logger = Logger.getLogger("DesignPatterns", {
	minLevel: LogLevel.INFO,
	includeTimestamp: true,
});

// ===== CREATIONAL PATTERNS =====

function creational(): void {
	// 1. FACTORY METHOD
	logger.info(createButton("android", "Submit").render());

	// 2. ABSTRACT FACTORY
	for (const platform of ["ios", "android"]) {
		const ui = renderUI(uiFactoryFor(platform), {
			button: "Save",
			checkbox: "Remember me",
		});
		logger.info(`${ui.button} / ${ui.checkbox}`);
	}

	try {
		uiFactoryFor("windows");
	} catch (error) {
		if (!isPatternError(error)) throw error;
		logger.warn(error.message, { code: error.code });
	}

	// 3. BUILDER
	const burger = new BurgerBuilder()
		.buns("sesame")
		.patty("fish-patty")
		.sauce("secret-sauce")
		.build();
	logger.info(burger.describe());

	// 4. PROTOTYPE
	const original = new Rectangle({ x: 0, y: 0, color: "red", width: 10, height: 20 });
	const copy = original.clone();
	copy.width = 99;
	logger.info(`Original width ${original.width}, clone width ${copy.width}`);
}

// ===== STRUCTURAL PATTERNS =====

function structural(): void {
	// 6. ADAPTER
	const hole = new RoundHole(5);
	logger.info(`Round peg r=5 fits: ${hole.fits(new RoundPeg(5))}`);
	for (const width of [5, 10]) {
		const adapter = new SquarePegAdapter(new SquarePeg(width));
		logger.info(`Square peg w=${width} fits: ${hole.fits(adapter)}`);
	}

	// 7. BRIDGE
	const tv = new Tv();
	new Remote(tv).togglePower();
	const radio = new Radio();
	const remote = new AdvancedRemote(radio);
	remote.volumeUp();
	remote.mute();
	logger.info(`TV on: ${tv.isEnabled()}, radio volume: ${radio.getVolume()}`);

	// 8. COMPOSITE
	const all = new CompoundGraphic(
		new Dot(1, 2),
		new CompoundGraphic(new Circle(5, 3, 10), new Dot(2, 2)),
	);
	all.move(1, 1);
	for (const line of all.draw()) logger.info(line);

	// 9. PROXY
	const youtube = new CachedYouTubeService(
		new YouTubeAPIService([
			{ id: "intro", title: "Intro to patterns" },
			{ id: "builders", title: "Fluent builders" },
		]),
	);
	youtube.list();
	logger.info(`Videos: ${youtube.list().join(", ")}`);
}

export async function main(): Promise<void> {
	creational();

	// 5. SINGLETON
	const [first, second] = await Promise.all([Database.connect(), Database.connect()]);
	logger.info(first.query("SELECT 1"), {
		sameInstance: first === second,
		constructions: Database.constructionCount,
	});

	structural();
	logger.info("=== Design Patterns Examples Complete ===");
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
	main().catch((error) => {
		logger.error("Walkthrough failed", error);
		process.exitCode = 1;
	});
}
