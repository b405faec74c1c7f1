import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULT_BUNDLE_TITLE } from '../bundle/encoder.js';
import type { CollectRequest } from '../collector.js';
import { ConfigError, InvalidDocumentPathError } from '../exceptions.js';
import { assertSafeRelativePath } from '../paths.js';
import type { FileSystemPort } from '../ports/file-system.js';

export const PROFILE_FILE_NAME = 'confbundle.json';

/** Paths are restored under the output root, so they must stay inside the source root too. */
const RelativePathSchema = z.string().superRefine((file, ctx) => {
  try {
    assertSafeRelativePath(file);
  } catch (error) {
    if (!(error instanceof InvalidDocumentPathError)) throw error;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
  }
});

const SectionSchema = z.object({
  title: z.string().min(1),
  files: z.array(RelativePathSchema),
});

export const ProfileSchema = z
  .object({
    /** File that must exist in the source root before anything is bundled */
    entryFile: RelativePathSchema.default('init.lua'),
    commentPrefix: z.string().default(''),
    title: z.string().min(1).default(DEFAULT_BUNDLE_TITLE),
    sections: z.array(SectionSchema).min(1),
  })
  .superRefine((profile, ctx) => {
    const seen = new Set<string>();
    profile.sections.forEach((section, sectionIndex) => {
      section.files.forEach((file, fileIndex) => {
        if (seen.has(file)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate path: ${file}`,
            path: ['sections', sectionIndex, 'files', fileIndex],
          });
        }
        seen.add(file);
      });
    });
  });

export type Profile = z.infer<typeof ProfileSchema>;
export type ProfileSection = z.infer<typeof SectionSchema>;

/** Modular Neovim layout: entry point, core settings, plugin loader, plugin specs. */
export const DEFAULT_PROFILE: Profile = {
  entryFile: 'init.lua',
  commentPrefix: '-- ',
  title: 'Flattened Neovim configuration',
  sections: [
    { title: 'ENTRY POINT', files: ['init.lua'] },
    {
      title: 'CORE CONFIGURATION',
      files: [
        'lua/config/options.lua',
        'lua/config/keymaps.lua',
        'lua/config/autocmds.lua',
        'lua/config/lazy.lua',
      ],
    },
    { title: 'PLUGIN LOADER', files: ['lua/plugins/init.lua'] },
    {
      title: 'PLUGIN SPECIFICATIONS',
      files: [
        'lua/plugins/colorscheme.lua',
        'lua/plugins/ui.lua',
        'lua/plugins/editor.lua',
        'lua/plugins/fzf-lua.lua',
        'lua/plugins/lsp.lua',
        'lua/plugins/completion.lua',
        'lua/plugins/flash.lua',
        'lua/plugins/git.lua',
        'lua/plugins/copilot.lua',
        'lua/plugins/aerial.lua',
        'lua/plugins/diffview.lua',
        'lua/plugins/oil.lua',
        'lua/plugins/treesitter-textobjects.lua',
        'lua/plugins/snacks.lua',
        'lua/plugins/noice.lua',
        'lua/plugins/indent-blankline.lua',
        'lua/plugins/obsidian.lua',
      ],
    },
  ],
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

export function parseProfile(raw: unknown, source: string): Profile {
  const parsed = ProfileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid profile ${source}: ${formatIssues(parsed.error)}`, parsed.error);
  }
  return parsed.data;
}

export async function loadProfile(fs: FileSystemPort, filePath: string): Promise<Profile> {
  const text = await fs.readTextFile(filePath);
  if (text === undefined) {
    throw new ConfigError(`Profile not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Profile is not valid JSON: ${filePath}`, error);
  }
  return parseProfile(raw, filePath);
}

/** Ordered request list for the collector, section titles attached. */
export function profileRequests(profile: Profile): CollectRequest[] {
  return profile.sections.flatMap((section) =>
    section.files.map((file) => ({ path: file, section: section.title })),
  );
}

/**
 * Explicit profile path first, then `confbundle.json` in the source root,
 * then the built-in layout.
 */
export async function resolveProfile(
  fs: FileSystemPort,
  sourceDir: string,
  explicitPath?: string,
): Promise<Profile> {
  if (explicitPath) return loadProfile(fs, explicitPath);

  const local = path.join(sourceDir, PROFILE_FILE_NAME);
  if (await fs.exists(local)) return loadProfile(fs, local);

  return DEFAULT_PROFILE;
}
