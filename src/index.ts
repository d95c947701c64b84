import {
  Client,
  GatewayIntentBits,
  Events,
  MessageFlags,
  PermissionFlagsBits,
  type ChatInputCommandInteraction,
} from 'discord.js';
import { loadConfig, requireToken } from './config.ts';
import { HangmanError } from './errors.ts';
import { tally } from './game.ts';
import { createLogger, setLogLevel } from './logger.ts';
import { buildBoardEmbed } from './render.ts';
import { SessionStore } from './sessions.ts';
import type { Game } from './types.ts';
import { addWord, pickWord, removeWord, useWordStore } from './words.ts';

/** ===== Config ===== */
const config = loadConfig();
setLogLevel(config.logLevel);
useWordStore(config.wordsFile);

const log = createLogger('bot');

/** ===== Stare ===== */
// un joc per jucător (user id)
const sessions = new SessionStore({ keepWon: config.resignKeepsWin });

const client = new Client({ intents: [GatewayIntentBits.Guilds] });

/** ===== Utilitare ===== */
async function isStaff(interaction: ChatInputCommandInteraction) {
  const member = await interaction.guild?.members.fetch(interaction.user.id);
  if (!member) return false;
  const isAdmin = member.permissions.has(PermissionFlagsBits.Administrator);
  const hasKick = member.permissions.has(PermissionFlagsBits.KickMembers);
  const hasStaffRole = config.staffRoleId ? member.roles.cache.has(config.staffRoleId) : false;
  return isAdmin || hasKick || hasStaffRole;
}

function boardReply(game: Game, title?: string) {
  const embed = buildBoardEmbed(tally(game), title).setFooter({ text: `Joc ${game.name}` });
  return { embeds: [embed] };
}

async function replyError(interaction: ChatInputCommandInteraction, content: string) {
  if (interaction.deferred || interaction.replied) {
    await interaction.editReply({ content });
  } else {
    await interaction.reply({ content, flags: MessageFlags.Ephemeral });
  }
}

/** ===== Joc ===== */
async function startGame(interaction: ChatInputCommandInteraction) {
  const requested = interaction.options.getString('categorie') ?? 'random';
  const { word, category } = await pickWord(requested);
  const game = sessions.start(interaction.user.id, word);

  log.info(`Joc ${game.name} pornit pentru ${interaction.user.tag} (categoria ${category})`);
  return interaction.reply(boardReply(game, `🎮 Spânzurătoarea • ${category}`));
}

async function guess(interaction: ChatInputCommandInteraction) {
  const letter = interaction.options.getString('litera', true).trim().toLowerCase();
  const game = sessions.guess(interaction.user.id, letter);
  if (!game) {
    return interaction.reply({
      content: 'Nu ai niciun joc activ. Pornește unul cu **/hangman start**.',
      flags: MessageFlags.Ephemeral,
    });
  }

  log.debug(`Joc ${game.name}: '${letter}' -> ${game.state} (${game.turnsLeft} rămase)`);
  return interaction.reply(boardReply(game));
}

async function resignGame(interaction: ChatInputCommandInteraction) {
  const game = sessions.resign(interaction.user.id);
  if (!game) {
    return interaction.reply({ content: 'Niciun joc activ.', flags: MessageFlags.Ephemeral });
  }

  log.info(`Joc ${game.name}: ${interaction.user.tag} a renunțat`);
  return interaction.reply(boardReply(game, '🏳️ Ai renunțat'));
}

async function status(interaction: ChatInputCommandInteraction) {
  const game = sessions.get(interaction.user.id);
  if (!game) {
    return interaction.reply({ content: 'Niciun joc activ.', flags: MessageFlags.Ephemeral });
  }
  return interaction.reply({ ...boardReply(game), flags: MessageFlags.Ephemeral });
}

/** ===== Cuvinte (doar staff) ===== */
async function manageWords(interaction: ChatInputCommandInteraction, sub: 'add' | 'del') {
  if (!(await isStaff(interaction))) {
    return interaction.reply({
      content: 'Ai nevoie de rolul de staff (Kick Members) sau Administrator.',
      flags: MessageFlags.Ephemeral,
    });
  }

  const cat = interaction.options.getString('categorie', true);
  const word = interaction.options.getString('cuvant', true).toLowerCase().trim();
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  if (sub === 'add') {
    await addWord(cat, word);
    return interaction.editReply(`✅ Am adăugat **${word}** în categoria **${cat}**.`);
  }
  await removeWord(cat, word);
  return interaction.editReply(`🗑️ Am șters **${word}** din categoria **${cat}**.`);
}

/** ===== Interacțiuni slash ===== */
async function dispatch(interaction: ChatInputCommandInteraction) {
  const sub = interaction.options.getSubcommand(false);
  switch (sub) {
    case 'start': return startGame(interaction);
    case 'guess': return guess(interaction);
    case 'resign': return resignGame(interaction);
    case 'status': return status(interaction);
    case 'add':
    case 'del':
      return manageWords(interaction, sub);
    default:
      return interaction.reply({
        content: 'Folosește **/hangman start**, **guess**, **resign**, **status**, **add**, **del**.',
        flags: MessageFlags.Ephemeral,
      });
  }
}

client.on(Events.InteractionCreate, async (interaction) => {
  if (!interaction.isChatInputCommand()) return;
  if (interaction.commandName !== 'hangman') return;

  try {
    await dispatch(interaction);
  } catch (e) {
    if (e instanceof HangmanError) {
      await replyError(interaction, `❌ ${e.message}`).catch((err) => log.error(err));
      return;
    }
    log.error(e);
    await replyError(interaction, '❌ Eroare neașteptată, încearcă din nou.').catch((err) => log.error(err));
  }
});

/** ===== Ready & Login ===== */
client.once(Events.ClientReady, (c) => {
  log.info(`✅ Logged in as ${c.user.tag} (PID ${process.pid})`);
});

client.login(requireToken(config)).catch((err) => {
  log.error(err);
  process.exit(1);
});
