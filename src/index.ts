export {
	type BrowserOptions,
	type ScanOptions,
	ServiceBrowser,
	scan,
} from "./browser.js";
export * from "./const.js";
export * from "./core/index.js";
export * from "./exceptions.js";
export * from "./settings.js";
export * from "./support/index.js";
