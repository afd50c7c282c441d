import {
  DEFAULT_AUTHOR_EMAIL,
  DEFAULT_AUTHOR_NAME,
  type CommitAuthor,
} from '../types/index.js';
import type { Template } from './template.js';

/** Expand the author's name and email; an empty result falls back to the defaults. */
export function resolveCommitAuthor(tmpl: Template, author: CommitAuthor): CommitAuthor {
  return {
    name: tmpl.apply(author.name) || DEFAULT_AUTHOR_NAME,
    email: tmpl.apply(author.email) || DEFAULT_AUTHOR_EMAIL,
  };
}
