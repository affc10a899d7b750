/**
 * Language Server settings
 */

export interface HackOutlineSettings {
    /** Answer document symbol and outline requests */
    enableOutline: boolean;
    /** Documents longer than this many characters get an empty outline */
    maxFileSize: number;
}

export const SETTINGS_SECTION = 'hackOutline';

export const defaultSettings: HackOutlineSettings = {
    enableOutline: true,
    maxFileSize: 1048576 // 1MB
};

/**
 * Global settings (used when there is no workspace configuration)
 */
export let globalSettings: HackOutlineSettings = defaultSettings;

export function setGlobalSettings(settings: HackOutlineSettings): void {
    globalSettings = settings;
}

/**
 * Fills in missing or mistyped values from the defaults
 */
export function resolveSettings(config: unknown): HackOutlineSettings {
    if (typeof config !== 'object' || config === null) {
        return { ...defaultSettings };
    }
    const enableOutline: unknown = Reflect.get(config, 'enableOutline');
    const maxFileSize: unknown = Reflect.get(config, 'maxFileSize');
    return {
        enableOutline: typeof enableOutline === 'boolean' ? enableOutline : defaultSettings.enableOutline,
        maxFileSize: typeof maxFileSize === 'number' && maxFileSize > 0 ? maxFileSize : defaultSettings.maxFileSize
    };
}

export function allowsOutline(settings: HackOutlineSettings, contentLength: number): boolean {
    return settings.enableOutline && contentLength <= settings.maxFileSize;
}
