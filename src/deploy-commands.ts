import { REST, Routes, SlashCommandBuilder, type APIApplication } from 'discord.js';
import { loadConfig, requireToken } from './config.ts';
import { createLogger, setLogLevel } from './logger.ts';
import { categories, useWordStore } from './words.ts';

const config = loadConfig();
setLogLevel(config.logLevel);
useWordStore(config.wordsFile);

const log = createLogger('deploy');
const rest = new REST({ version: '10' }).setToken(requireToken(config));

async function getAppId(): Promise<string> {
  const app = (await rest.get(Routes.oauth2CurrentApplication())) as APIApplication;
  return app.id;
}

function buildCommand(cats: string[]) {
  const choices = Array.from(new Set(cats))
    .sort((a, b) => a.localeCompare(b))
    .slice(0, 25) // limita Discord pentru choices
    .map((c) => ({ name: c, value: c }));

  return new SlashCommandBuilder()
    .setName('hangman')
    .setDescription('Joacă spânzurătoarea (un joc pentru fiecare jucător)')
    .setDMPermission(false)
    .addSubcommand((sc) =>
      sc
        .setName('start')
        .setDescription('Pornește un joc nou')
        .addStringOption((o) =>
          o
            .setName('categorie')
            .setDescription('Alege categoria de cuvinte (sau lasă gol pentru random)')
            .addChoices(...choices),
        ),
    )
    .addSubcommand((sc) =>
      sc
        .setName('guess')
        .setDescription('Ghicește o literă')
        .addStringOption((o) =>
          o.setName('litera').setDescription('O literă a-z').setRequired(true).setMinLength(1).setMaxLength(1),
        ),
    )
    .addSubcommand((sc) => sc.setName('resign').setDescription('Renunță la jocul curent'))
    .addSubcommand((sc) => sc.setName('status').setDescription('Arată tabla jocului curent'))
    .addSubcommand((sc) =>
      sc
        .setName('add')
        .setDescription('Adaugă un cuvânt nou într-o categorie (staff)')
        .addStringOption((o) => o.setName('categorie').setDescription('Categoria țintă').setRequired(true))
        .addStringOption((o) => o.setName('cuvant').setDescription('Cuvântul de adăugat').setRequired(true)),
    )
    .addSubcommand((sc) =>
      sc
        .setName('del')
        .setDescription('Șterge un cuvânt dintr-o categorie (staff)')
        .addStringOption((o) =>
          o.setName('categorie').setDescription('Categoria țintă').setRequired(true).addChoices(...choices),
        )
        .addStringOption((o) => o.setName('cuvant').setDescription('Cuvântul de șters').setRequired(true)),
    )
    .toJSON();
}

async function main() {
  const appId = await getAppId();
  const commands = [buildCommand(await categories())];

  if (config.guildId) {
    log.info('🔁 Înregistrez comenzi GUILD…');
    await rest.put(Routes.applicationGuildCommands(appId, config.guildId), { body: commands });
    log.info('✅ GUILD commands up to date.');
  } else {
    log.info('🌍 Înregistrez comenzi GLOBAL (poate dura câteva minute)…');
    await rest.put(Routes.applicationCommands(appId), { body: commands });
    log.info('✅ GLOBAL commands up to date.');
  }
}

main().catch((err) => {
  log.error(err);
  process.exit(1);
});
