import { KEY_ESC, type Screen } from "@termloop/core";
import { defineThreadedApp } from "@termloop/node";

export type GravityMessage = Readonly<{ type: "gravity"; dy: number }>;

function isGravityMessage(v: unknown): v is GravityMessage {
  return (
    typeof v === "object" &&
    v !== null &&
    "type" in v &&
    v.type === "gravity" &&
    "dy" in v &&
    typeof v.dy === "number"
  );
}

function drawPosition(screen: Screen, x: number, y: number): void {
  screen.drawText(3, 16, String(x).padStart(12));
  screen.drawText(4, 16, String(y).padStart(12));
}

/**
 * Runs on the worker thread. Position changes from keys and from gravity
 * messages are serialised by the worker, so no lock is needed.
 */
export default defineThreadedApp<undefined>(() => {
  let x = 0;
  let y = 0;

  return {
    onEnter: ({ screen }) => {
      screen.drawText(0, 1, "Movement Control with Gravity", { bold: true, underline: true });
      screen.drawText(3, 2, "X coordinate:");
      screen.drawText(4, 2, "Y coordinate:");
      drawPosition(screen, x, y);
      screen.drawText(7, 2, "Keyboard Controls:", { bold: true });
      screen.drawText(8, 4, "W/S - Move up/down");
      screen.drawText(9, 4, "A/D - Move left/right");
      screen.drawText(10, 4, "ESC - Exit app", { bold: true });
    },
    onMessage: (message) => {
      if (isGravityMessage(message)) y += message.dy;
    },
    onUpdate: ({ screen, key, app }) => {
      if (key === KEY_ESC) {
        app.requestExit();
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
  };
});
