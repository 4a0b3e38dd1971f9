import * as fs from 'fs/promises';
import * as path from 'path';
import { FullPromptsConfig, FullPromptsConfigSchema } from './promptTypes';
import { errorMessage } from '../utils';

export interface PromptServiceDependencies {
    readFileFn?: (path: string, encoding: BufferEncoding) => Promise<string>;
    resolvePathFn?: (...paths: string[]) => string;
    dirnameFn?: (p: string) => string;
    isAbsoluteFn?: (p: string) => boolean;
}

// Default templates live beside the agents, one directory per agent
export const DEFAULT_PROMPTS_DIR = 'src/agents/prompts';

const PLACEHOLDER = /\{\{([^{}]+)\}\}/g;

type TemplateSource = 'custom' | 'default';

interface TemplateLocation {
    source: TemplateSource;
    filePath: string;
}

/**
 * Fills `{{key}}` placeholders from `context` in a single pass over `template`.
 * Inserted values are never scanned for placeholders themselves, and unknown keys
 * are left as they are.
 */
export function fillTemplate(template: string, context: Record<string, unknown>): string {
    return template.replace(PLACEHOLDER, (placeholder: string, key: string) =>
        Object.prototype.hasOwnProperty.call(context, key) ? String(context[key]) : placeholder
    );
}

/**
 * Serves prompt templates by agent and key. A JSON prompts config can point any
 * template at a custom file (relative paths are taken from the config's directory);
 * everything else comes from `DEFAULT_PROMPTS_DIR/<agent>/<key>.txt` under the
 * working directory.
 */
export class PromptService {
    private readonly readFile: (path: string, encoding: BufferEncoding) => Promise<string>;
    private readonly resolvePath: (...paths: string[]) => string;
    private readonly isAbsolute: (p: string) => boolean;

    private readonly configFilePath: string | null;
    private readonly configDir: string | null;
    private config: FullPromptsConfig | null = null;

    constructor(configFilePath?: string, deps: PromptServiceDependencies = {}) {
        this.readFile = deps.readFileFn ?? fs.readFile;
        this.resolvePath = deps.resolvePathFn ?? path.resolve;
        this.isAbsolute = deps.isAbsoluteFn ?? path.isAbsolute;
        const dirname = deps.dirnameFn ?? path.dirname;

        this.configFilePath = configFilePath ? this.resolvePath(configFilePath) : null;
        this.configDir = this.configFilePath ? dirname(this.configFilePath) : null;
    }

    /**
     * Loads the template for `agentName`/`promptKey` and fills it from `context`.
     * @throws Error when the prompts config or the template cannot be read
     */
    async getFormattedPrompt(agentName: string, promptKey: string, context: Record<string, unknown>): Promise<string> {
        const config = await this.loadConfig();
        const location = this.locate(config, agentName, promptKey);

        let template: string;
        try {
            template = await this.readFile(location.filePath, 'utf-8');
        } catch (error) {
            throw new Error(`Prompt ${agentName}/${promptKey}: cannot read ${location.source} template ${location.filePath}: ${errorMessage(error)}`);
        }
        if (!template) {
            throw new Error(`Prompt ${agentName}/${promptKey}: ${location.source} template ${location.filePath} is empty.`);
        }
        return fillTemplate(template, context);
    }

    private async loadConfig(): Promise<FullPromptsConfig | null> {
        if (!this.configFilePath || this.config) {
            return this.config;
        }
        try {
            const raw = await this.readFile(this.configFilePath, 'utf-8');
            this.config = FullPromptsConfigSchema.parse(JSON.parse(raw));
        } catch (error) {
            throw new Error(`Prompts config ${this.configFilePath} could not be loaded: ${errorMessage(error)}`);
        }
        return this.config;
    }

    private locate(config: FullPromptsConfig | null, agentName: string, promptKey: string): TemplateLocation {
        const custom = config?.prompts[agentName]?.[promptKey];
        if (!custom) {
            return { source: 'default', filePath: this.resolvePath(`${DEFAULT_PROMPTS_DIR}/${agentName}/${promptKey}.txt`) };
        }
        if (this.isAbsolute(custom.path)) {
            return { source: 'custom', filePath: custom.path };
        }
        const filePath = this.configDir ? this.resolvePath(this.configDir, custom.path) : this.resolvePath(custom.path);
        return { source: 'custom', filePath };
    }
}
