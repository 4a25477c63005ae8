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

import {
	AndroidButton,
	AndroidCheckbox,
	assertNever,
	type Button,
	type Checkbox,
	IOSButton,
	IOSCheckbox,
	parsePlatform,
	type Platform,
} from "./factory";

// A family factory: every product it creates shares one platform
export interface UIFactory {
	readonly platform: Platform;
	createButton(label: string): Button;
	createCheckbox(label: string, checked?: boolean): Checkbox;
}

export class IOSUIFactory implements UIFactory {
	readonly platform = "ios";

	createButton(label: string): Button {
		return new IOSButton(label);
	}

	createCheckbox(label: string, checked = false): Checkbox {
		return new IOSCheckbox(label, checked);
	}
}

export class AndroidUIFactory implements UIFactory {
	readonly platform = "android";

	createButton(label: string): Button {
		return new AndroidButton(label);
	}

	createCheckbox(label: string, checked = false): Checkbox {
		return new AndroidCheckbox(label, checked);
	}
}

export function uiFactoryFor(platform: string): UIFactory {
	const variant = parsePlatform(platform);
	switch (variant) {
		case "ios":
			return new IOSUIFactory();
		case "android":
			return new AndroidUIFactory();
		default:
			return assertNever(variant);
	}
}

export interface RenderedUI {
	platform: Platform;
	button: string;
	checkbox: string;
}

export function renderUI(
	factory: UIFactory,
	labels: { button: string; checkbox: string },
): RenderedUI {
	const button = factory.createButton(labels.button);
	const checkbox = factory.createCheckbox(labels.checkbox);
	return {
		platform: factory.platform,
		button: button.render(),
		checkbox: checkbox.render(),
	};
}
