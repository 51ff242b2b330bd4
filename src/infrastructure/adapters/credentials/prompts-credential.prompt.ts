import { Injectable } from '@nestjs/common';
import prompts, { PromptObject } from 'prompts';
import { CredentialFields } from '../../../application/ports/output/credential-source.port';
import {
  CredentialPromptPort,
  PromptedField,
} from '../../../application/ports/output/credential-prompt.port';

const QUESTIONS: Record<PromptedField, PromptObject<PromptedField>> = {
  accessKeyId: {
    type: 'text',
    name: 'accessKeyId',
    message: 'Enter AWS Access Key ID:',
  },
  secretAccessKey: {
    type: 'password',
    name: 'secretAccessKey',
    message: 'Enter AWS Secret Access Key:',
  },
};

/**
 * Interactive credential prompt on the terminal
 */
@Injectable()
export class PromptsCredentialPrompt implements CredentialPromptPort {
  async prompt(missing: PromptedField[]): Promise<CredentialFields> {
    if (missing.length === 0) {
      return {};
    }

    let cancelled = false;
    const answers = await prompts(
      missing.map((field) => QUESTIONS[field]),
      {
        onCancel: () => {
          cancelled = true;
          return false;
        },
      },
    );

    if (cancelled) {
      throw new Error('Credential prompt was cancelled');
    }

    const result: CredentialFields = {};
    for (const field of missing) {
      const value: unknown = answers[field];
      if (typeof value === 'string' && value.trim().length > 0) {
        result[field] = value.trim();
      }
    }
    return result;
  }
}
