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

import { Logger } from "./logger";

const logger = Logger.getLogger("VideoService");

export interface VideoInfo {
	id: string;
	title: string;
}

export interface VideoService {
	list(): readonly string[];
	info(id: string): VideoInfo | undefined;
}

/**
 * Stand-in for the remote video API: answers from an in-memory catalog.
 * `calls` counts how often it was actually reached.
 */
export class YouTubeAPIService implements VideoService {
	private readonly catalog: VideoInfo[];
	calls = 0;

	constructor(catalog: readonly VideoInfo[]) {
		this.catalog = catalog.map((video) => ({ ...video }));
	}

	list(): readonly string[] {
		this.calls += 1;
		return this.catalog.map((video) => video.id);
	}

	info(id: string): VideoInfo | undefined {
		this.calls += 1;
		const video = this.catalog.find((entry) => entry.id === id);
		return video && { ...video };
	}
}

/**
 * Caching proxy. The wrapped service is asked for the list at most once until
 * {@link invalidate} is called; per-video details are cached by id.
 */
export class CachedYouTubeService implements VideoService {
	private cachedVideos: readonly string[] | undefined;
	private readonly cachedInfo = new Map<string, VideoInfo | undefined>();

	constructor(private readonly service: VideoService) {}

	list(): readonly string[] {
		if (this.cachedVideos === undefined) {
			logger.debug("Video list cache miss");
			this.cachedVideos = Object.freeze([...this.service.list()]);
		}
		return this.cachedVideos;
	}

	info(id: string): VideoInfo | undefined {
		if (!this.cachedInfo.has(id)) {
			logger.debug("Video info cache miss", { id });
			const video = this.service.info(id);
			this.cachedInfo.set(id, video && Object.freeze({ ...video }));
		}
		return this.cachedInfo.get(id);
	}

	invalidate(): void {
		this.cachedVideos = undefined;
		this.cachedInfo.clear();
		logger.debug("Video caches invalidated");
	}
}
