/**
 * Move a point with W/A/S/D on the controlling thread. ESC exits.
 *
 *   npm run example:move
 */

import { KEY_ESC, type Screen } from "@termloop/core";
import { createNodeApplication } from "@termloop/node";

const VALUE_COL = 16;

function drawPosition(screen: Screen, x: number, y: number): void {
  screen.drawText(3, VALUE_COL, String(x).padStart(12));
  screen.drawText(4, VALUE_COL, String(y).padStart(12));
}

let x = 0;
let y = 0;

const app = createNodeApplication({
  keypad: true,
  hooks: {
    onEnter: ({ screen }) => {
      screen.drawText(0, 7, "Movement Control", { bold: true, underline: true });
      screen.drawText(3, 2, "X coordinate:");
      screen.drawText(4, 2, "Y coordinate:");
      drawPosition(screen, x, y);
      screen.drawText(7, 2, "Keyboard Controls:", { bold: true });
      screen.drawText(8, 4, "W/S - Move up/down");
      screen.drawText(9, 4, "A/D - Move left/right");
      screen.drawText(10, 4, "ESC - Exit app", { bold: true });
    },
    onUpdate: ({ screen, key, app: control }) => {
      if (key === KEY_ESC) {
        control.requestExit();
        return;
      }
      switch (key === null ? "" : String.fromCharCode(key).toLowerCase()) {
        case "w":
          y--;
          break;
        case "s":
          y++;
          break;
        case "a":
          x--;
          break;
        case "d":
          x++;
          break;
      }
      drawPosition(screen, x, y);
    },
  },
});

await app.run();
