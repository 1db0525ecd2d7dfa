import { zodToJsonSchema } from 'zod-to-json-schema';
import { LauncherSettingsSchema } from './settings.js';

export interface ConfigurationDescription {
  installationInstructions: string;
  defaultSettings: string;
  settingsSchema: string;
}

const INSTALLATION_INSTRUCTIONS = `
## Serena Context Server Setup

1. **Install Python 3.11 or 3.12** (required):
   \`\`\`bash
   brew install python@3.11
   python3.11 --version
   \`\`\`

2. **Install Serena Agent**:
   \`\`\`bash
   python3.11 -m pip install serena-agent
   \`\`\`

3. **Configure the context server settings**:
   \`\`\`json
   {
     "context_servers": {
       "serena-context-server": {
         "source": "extension",
         "enabled": true,
         "settings": {
           "python_executable": "/opt/homebrew/bin/python3.11"
         }
       }
     }
   }
   \`\`\`

Python 3.11/3.12 installations are detected automatically; use the
\`python_executable\` setting to point at a specific interpreter.
`;

const DEFAULT_SETTINGS = `
{
  "python_executable": null
}
`;

export function describeConfiguration(): ConfigurationDescription {
  return {
    installationInstructions: INSTALLATION_INSTRUCTIONS,
    defaultSettings: DEFAULT_SETTINGS,
    settingsSchema: JSON.stringify(zodToJsonSchema(LauncherSettingsSchema, 'SerenaContextServerSettings')),
  };
}
