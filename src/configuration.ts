import * as path from 'path';
import * as fs from 'fs';
import { AnnotationStyle } from './dataStructures';
import { RendererOptions } from './annotationRenderer';
import { DEFAULT_MIN_LINES } from './scopeExtractor';

/**
 * Utility functions for handling extension configuration
 */

/**
 * Configuration structure for the extension
 */
export interface ScopeEchoConfig {
    minLines: number;
    overlayPrefix: string;
    style: AnnotationStyle;
    deduplicateAnchors: boolean;
    enableByDefault: boolean;
    scopeTargets: Record<string, string[]>;
    grammars: Record<string, string>;
    version: string;
}

/**
 * Default configuration
 * The label colour is the Dark+ comment colour
 */
export const DEFAULT_CONFIG: ScopeEchoConfig = {
    minLines: DEFAULT_MIN_LINES,
    overlayPrefix: '  ¤ ',
    style: {
        color: '#6A9955',
        fontStyle: 'italic'
    },
    deduplicateAnchors: true,
    enableByDefault: true,
    scopeTargets: {},
    grammars: {},
    version: '1.0.0'
};

const STYLE_KEYS = ['color', 'fontStyle', 'fontWeight', 'margin'] as const;
// A file name inside tree-sitter-wasms' out/ directory, never a path
const GRAMMAR_FILE = /^[A-Za-z0-9_.-]+\.wasm$/;

/**
 * Get the path to the configuration file
 */
export function getConfigFilePath(workspaceRoot: string | undefined): string | null {
    if (!workspaceRoot) {
        return null;
    }
    return path.join(workspaceRoot, '.vscode', 'scope-echo.json');
}

// Cached configuration to avoid repeated file reads
let cachedConfig: { workspaceRoot: string | undefined; config: ScopeEchoConfig } | null = null;

/**
 * Load configuration from JSON file (with caching)
 */
export function loadConfig(workspaceRoot: string | undefined): ScopeEchoConfig {
    if (cachedConfig && cachedConfig.workspaceRoot === workspaceRoot) {
        return cachedConfig.config;
    }

    const config = loadConfigFromFile(workspaceRoot);
    cachedConfig = { workspaceRoot, config };
    return config;
}

/**
 * Load configuration from JSON file without caching
 */
function loadConfigFromFile(workspaceRoot: string | undefined): ScopeEchoConfig {
    const configPath = getConfigFilePath(workspaceRoot);
    if (!configPath || !fs.existsSync(configPath)) {
        console.log('[scope-echo] Configuration file not found, using defaults');
        return defaultConfig();
    }

    try {
        const configData = fs.readFileSync(configPath, 'utf8');
        const config = parseConfig(JSON.parse(configData));
        console.log(`[scope-echo] Loaded configuration from: ${configPath}`);
        return config;
    } catch (error) {
        console.error('[scope-echo] Failed to load configuration, using defaults:', error);
        return defaultConfig();
    }
}

/**
 * Merge raw user configuration over the defaults.
 * Fields with the wrong shape are skipped one by one and keep their default.
 */
export function parseConfig(raw: unknown): ScopeEchoConfig {
    const config = defaultConfig();
    if (!isRecord(raw)) {
        console.warn('[scope-echo] Configuration is not an object, using defaults');
        return config;
    }

    if (raw.minLines !== undefined) {
        if (typeof raw.minLines === 'number' && Number.isInteger(raw.minLines) && raw.minLines >= 0) {
            config.minLines = raw.minLines;
        } else {
            console.warn(`[scope-echo] Ignoring minLines: expected a non-negative integer, got ${JSON.stringify(raw.minLines)}`);
        }
    }

    if (raw.overlayPrefix !== undefined) {
        if (typeof raw.overlayPrefix === 'string') {
            config.overlayPrefix = raw.overlayPrefix;
        } else {
            console.warn('[scope-echo] Ignoring overlayPrefix: expected a string');
        }
    }

    for (const key of ['deduplicateAnchors', 'enableByDefault'] as const) {
        const value = raw[key];
        if (value === undefined) {
            continue;
        }
        if (typeof value === 'boolean') {
            config[key] = value;
        } else {
            console.warn(`[scope-echo] Ignoring ${key}: expected a boolean`);
        }
    }

    if (raw.style !== undefined) {
        if (isRecord(raw.style)) {
            const style: AnnotationStyle = { ...config.style };
            for (const key of STYLE_KEYS) {
                const value = raw.style[key];
                if (typeof value === 'string') {
                    style[key] = value;
                } else if (value !== undefined) {
                    console.warn(`[scope-echo] Ignoring style.${key}: expected a string`);
                }
            }
            config.style = style;
        } else {
            console.warn('[scope-echo] Ignoring style: expected an object');
        }
    }

    if (raw.scopeTargets !== undefined) {
        if (isRecord(raw.scopeTargets)) {
            for (const [languageKey, kinds] of Object.entries(raw.scopeTargets)) {
                if (Array.isArray(kinds) && kinds.every(kind => typeof kind === 'string')) {
                    config.scopeTargets[languageKey] = kinds.filter((kind): kind is string => typeof kind === 'string');
                } else {
                    console.warn(`[scope-echo] Ignoring scopeTargets.${languageKey}: expected a list of node kinds`);
                }
            }
        } else {
            console.warn('[scope-echo] Ignoring scopeTargets: expected an object');
        }
    }

    if (raw.grammars !== undefined) {
        if (isRecord(raw.grammars)) {
            for (const [languageKey, grammar] of Object.entries(raw.grammars)) {
                if (typeof grammar === 'string' && GRAMMAR_FILE.test(grammar)) {
                    config.grammars[languageKey] = grammar;
                } else {
                    console.warn(`[scope-echo] Ignoring grammars.${languageKey}: expected a .wasm file name`);
                }
            }
        } else {
            console.warn('[scope-echo] Ignoring grammars: expected an object');
        }
    }

    if (typeof raw.version === 'string') {
        config.version = raw.version;
    }

    return config;
}

/**
 * The part of the configuration the renderer consumes
 */
export function rendererOptionsFrom(config: ScopeEchoConfig): RendererOptions {
    return {
        overlayPrefix: config.overlayPrefix,
        style: config.style,
        deduplicateAnchors: config.deduplicateAnchors
    };
}

/**
 * Refresh the cached configuration by reloading from file
 */
export function refreshConfigCache(workspaceRoot: string | undefined): ScopeEchoConfig {
    console.log('[scope-echo] Refreshing configuration cache');
    cachedConfig = null;
    return loadConfig(workspaceRoot);
}

/**
 * Save configuration to JSON file
 */
export function saveConfig(workspaceRoot: string | undefined, config: ScopeEchoConfig): boolean {
    const configPath = getConfigFilePath(workspaceRoot);
    if (!configPath) {
        console.error('[scope-echo] No workspace available to save configuration');
        return false;
    }

    try {
        // Ensure .vscode directory exists
        const configDir = path.dirname(configPath);
        if (!fs.existsSync(configDir)) {
            fs.mkdirSync(configDir, { recursive: true });
        }

        fs.writeFileSync(configPath, JSON.stringify(config, null, 2));

        console.log(`[scope-echo] Configuration saved to: ${configPath}`);
        return true;
    } catch (error) {
        console.error('[scope-echo] Failed to save configuration:', error);
        return false;
    }
}

/**
 * Initialize configuration file with defaults if it doesn't exist
 */
export function initializeConfigFile(workspaceRoot: string | undefined): boolean {
    const configPath = getConfigFilePath(workspaceRoot);
    if (!configPath) {
        return false;
    }

    if (fs.existsSync(configPath)) {
        console.log('[scope-echo] Configuration file already exists');
        return true;
    }

    return saveConfig(workspaceRoot, DEFAULT_CONFIG);
}

function defaultConfig(): ScopeEchoConfig {
    return {
        ...DEFAULT_CONFIG,
        style: { ...DEFAULT_CONFIG.style },
        scopeTargets: {},
        grammars: {}
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
