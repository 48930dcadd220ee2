import type { DisplayMode, Mood, StatusResponse } from '@vampgotchi/common';

import { loadDefaultFont } from './font.js';
import { BLACK, Frame, PANEL_HEIGHT, PANEL_WIDTH, WHITE, type Color } from './frame.js';

export interface DisplayView {
  status: StatusResponse;
  /** `HH:MM` shown in the top bar. */
  clock: string;
}

interface Palette {
  paper: Color;
  ink: Color;
}

export const paletteFor = (theme: DisplayMode): Palette =>
  theme === 'black' ? { paper: BLACK, ink: WHITE } : { paper: WHITE, ink: BLACK };

export const statusWord = (status: StatusResponse): string => {
  if (status.attacking) return 'ATTACK!';
  if (status.scanning) return 'SCAN...';
  if (status.scanStatus === 'Error') return 'ERROR';
  return 'IDLE';
};

const LINE = 9;

const drawBattery = (frame: Frame, x: number, y: number, ink: Color) => {
  frame.rect(x, y, x + 12, y + 6, { outline: ink });
  frame.rect(x + 12, y + 2, x + 14, y + 4, { fill: ink });
  for (const offset of [2, 5, 8]) {
    frame.rect(x + offset, y + 1, x + offset + 2, y + 5, { fill: ink });
  }
};

const drawWifi = (frame: Frame, x: number, y: number, ink: Color) => {
  frame.arc(x, y, x + 8, y + 8, 225, 315, ink);
  frame.arc(x + 2, y + 2, x + 6, y + 6, 225, 315, ink);
  frame.ellipse(x + 3, y + 5, x + 5, y + 7, { fill: ink });
};

const drawEyes = (frame: Frame, x: number, y: number, mood: Mood, ink: Color) => {
  switch (mood) {
    case 'happy':
      frame.ellipse(x + 8, y + 11, x + 11, y + 14, { fill: ink });
      frame.line(x + 17, y + 12, x + 20, y + 12, ink);
      frame.line(x + 17, y + 13, x + 20, y + 13, ink);
      return;
    case 'angry':
      frame.line(x + 8, y + 14, x + 11, y + 11, ink);
      frame.line(x + 17, y + 11, x + 20, y + 14, ink);
      return;
    default:
      frame.ellipse(x + 8, y + 11, x + 11, y + 14, { fill: ink });
      frame.ellipse(x + 17, y + 11, x + 20, y + 14, { fill: ink });
  }
};

const drawMouth = (frame: Frame, x: number, y: number, mood: Mood, ink: Color) => {
  if (mood === 'happy' || mood === 'excited') {
    frame.arc(x + 8, y + 16, x + 20, y + 24, 0, 180, ink);
  } else if (mood === 'bored') {
    frame.line(x + 10, y + 22, x + 18, y + 22, ink);
  } else {
    frame.arc(x + 8, y + 20, x + 20, y + 28, 180, 360, ink);
  }
};

/** The vampire pet, about 29 by 36 pixels from (x, y). */
export const drawPet = (frame: Frame, x: number, y: number, mood: Mood, ink: Color) => {
  frame.ellipse(x + 3, y + 3, x + 25, y + 25, { outline: ink });
  frame.line(x + 5, y + 1, x + 8, y + 6, ink);
  frame.line(x + 23, y + 1, x + 20, y + 6, ink);
  drawEyes(frame, x, y, mood, ink);
  frame.rect(x + 11, y + 17, x + 12, y + 20, { fill: ink });
  frame.rect(x + 16, y + 17, x + 17, y + 20, { fill: ink });
  drawMouth(frame, x, y, mood, ink);
  frame.line(x, y + 35, x + 28, y + 35, ink);
};

const ellipsize = (text: string, max: number) => (text.length > max ? `${text.slice(0, max - 1)}~` : text);

/** Renders the full status screen for a 250 by 122 panel. */
export const renderStatusFrame = ({ status, clock }: DisplayView, theme: DisplayMode): Frame => {
  const { paper, ink } = paletteFor(theme);
  const frame = new Frame(PANEL_WIDTH, PANEL_HEIGHT, paper);
  const { pet, stats, network } = status;
  const font = loadDefaultFont();

  // Top bar
  drawBattery(frame, 2, 1, ink);
  drawWifi(frame, 20, 0, ink);
  frame.text(32, 1, `${network.mode} ${network.ip}`, ink);
  frame.text(PANEL_WIDTH - 2 - font.measure(clock), 1, clock, ink);
  frame.line(0, 10, PANEL_WIDTH - 1, 10, ink);

  // Title and status word
  frame.text(4, 13, 'VAMPGOTCHI', ink, { scale: 2 });
  const word = statusWord(status);
  frame.text(PANEL_WIDTH - 4 - font.measure(word, 2), 13, word, ink, { scale: 2 });

  // Pet stats
  let y = 31;
  frame.text(4, y, `HUNGER ${Math.floor((pet.hunger / 1000) * 100)}%`, ink);
  frame.text(100, y, `BLOOD ${pet.blood}%`, ink);
  y += LINE;
  frame.text(4, y, `LVL ${pet.level} EXP ${pet.exp}/${pet.expToNext}`, ink);
  y += LINE;
  frame.text(4, y, `COFFIN: ${pet.coffin}`, ink);
  frame.text(106, y, `$${pet.money}`, ink);
  y += LINE;
  for (const message of pet.activity.slice(-2)) {
    frame.text(4, y, ellipsize(message, 30), ink);
    y += LINE;
  }

  // Counters and target
  y = 85;
  frame.text(4, y, `TGT ${status.count} SCN ${stats.totalScans} ATK ${stats.totalAttacks}`, ink);
  y += LINE;
  if (status.selectedTarget) {
    frame.text(4, y, `${status.attacking ? 'HIT' : 'SEL'} ${status.selectedTarget}`, ink);
  }

  // Pet
  drawPet(frame, 200, 44, stats.mood, ink);
  frame.text(200, 84, ellipsize(stats.mood.toUpperCase(), 7), ink);

  // Footer
  frame.line(0, 110, PANEL_WIDTH - 1, 110, ink);
  frame.text(4, 113, `UP ${stats.uptime}`, ink);
  const unique = `UNIQUE ${stats.uniqueTargets}`;
  frame.text(PANEL_WIDTH - 4 - font.measure(unique), 113, unique, ink);

  return frame;
};
