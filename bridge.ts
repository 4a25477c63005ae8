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

import { z } from "zod";
import { InvalidDimensionError } from "./errors";
import { Logger } from "./logger";

const logger = Logger.getLogger("Device");

export const MIN_VOLUME = 0;
export const MAX_VOLUME = 100;
export const MIN_CHANNEL = 1;

// Implementation side of the bridge
export interface Device {
	readonly kind: string;
	isEnabled(): boolean;
	enable(): void;
	disable(): void;
	getVolume(): number;
	setVolume(volume: number): void;
	getChannel(): number;
	setChannel(channel: number): void;
}

const levelSchema = z.number().finite();

// NaN and infinities would slip past Math.min/Math.max, so they are rejected first
function clamp(name: string, value: number, min: number, max: number): number {
	if (!levelSchema.safeParse(value).success) {
		throw new InvalidDimensionError(name, value);
	}
	return Math.min(max, Math.max(min, value));
}

/** Common state for the bundled devices; remotes never see it directly. */
class DeviceState {
	on = false;
	volume = 30;
	channel = MIN_CHANNEL;
}

export class Tv implements Device {
	readonly kind = "tv";
	private readonly state = new DeviceState();

	isEnabled(): boolean {
		return this.state.on;
	}

	enable(): void {
		this.state.on = true;
		logger.info("TV powered on");
	}

	disable(): void {
		this.state.on = false;
		logger.info("TV powered off");
	}

	getVolume(): number {
		return this.state.volume;
	}

	setVolume(volume: number): void {
		this.state.volume = clamp("volume", volume, MIN_VOLUME, MAX_VOLUME);
	}

	getChannel(): number {
		return this.state.channel;
	}

	setChannel(channel: number): void {
		this.state.channel = clamp("channel", channel, MIN_CHANNEL, Number.MAX_SAFE_INTEGER);
	}
}

export class Radio implements Device {
	readonly kind = "radio";
	private readonly state = new DeviceState();

	isEnabled(): boolean {
		return this.state.on;
	}

	enable(): void {
		this.state.on = true;
		logger.info("Radio powered on");
	}

	disable(): void {
		this.state.on = false;
		logger.info("Radio powered off");
	}

	getVolume(): number {
		return this.state.volume;
	}

	setVolume(volume: number): void {
		this.state.volume = clamp("volume", volume, MIN_VOLUME, MAX_VOLUME);
	}

	getChannel(): number {
		return this.state.channel;
	}

	// Preset stations wrap after 99
	setChannel(channel: number): void {
		const next = clamp("channel", channel, MIN_CHANNEL, Number.MAX_SAFE_INTEGER);
		this.state.channel = next > 99 ? MIN_CHANNEL : next;
	}
}

/**
 * Abstraction side. Holds the device it was given but does not own it.
 */
export class Remote {
	constructor(protected readonly device: Device) {}

	togglePower(): void {
		if (this.device.isEnabled()) {
			this.device.disable();
		} else {
			this.device.enable();
		}
	}

	volumeDown(step = 10): void {
		this.device.setVolume(this.device.getVolume() - step);
	}

	volumeUp(step = 10): void {
		this.device.setVolume(this.device.getVolume() + step);
	}

	channelDown(): void {
		this.device.setChannel(this.device.getChannel() - 1);
	}

	channelUp(): void {
		this.device.setChannel(this.device.getChannel() + 1);
	}
}

export class AdvancedRemote extends Remote {
	mute(): void {
		this.device.setVolume(MIN_VOLUME);
	}
}
