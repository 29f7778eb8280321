import blessed from 'blessed';
import type { Renderer } from '../../core/loop';
import { STATUSES, type BoardFrame } from '../../core/types';
import { Header } from './Header';
import { Column } from './Column';
import { LogArea } from './LogArea';
import { CommandBar } from './CommandBar';
import { eventBus, type LogEvent } from '../../utils/logger';
import { TerminalError } from '../../utils/errors';

function createScreen(title: string): blessed.Widgets.Screen {
  try {
    return blessed.screen({
      smartCSR: true,
      title,
      fullUnicode: true,
    });
  } catch (error) {
    throw new TerminalError('Failed to initialise the terminal screen', { cause: error });
  }
}

export class App implements Renderer {
  screen: blessed.Widgets.Screen;

  header: Header;
  columns: Column[];
  logArea: LogArea;
  commandBar: CommandBar;

  private lastMessage: string | undefined;
  private onLog = (event: LogEvent) => {
    this.lastMessage = event.message;
  };

  constructor(title: string) {
    this.screen = createScreen(title);

    const headerHeight = 1;
    const commandBarHeight = 3;
    const logHeight = 9;

    this.header = new Header(this.screen, title);
    this.columns = STATUSES.map((status, i) =>
      new Column(this.screen, status, i, headerHeight, logHeight + commandBarHeight)
    );
    this.logArea = new LogArea(this.screen, logHeight, commandBarHeight);
    this.commandBar = new CommandBar(this.screen, commandBarHeight);

    eventBus.on('log', this.onLog);
  }

  draw(frame: BoardFrame) {
    this.header.update(frame);
    frame.columns.forEach((view, i) => this.columns[i]?.update(view));
    this.logArea.update(frame.logs);
    this.commandBar.update(this.lastMessage);
    this.screen.render();
  }

  destroy() {
    eventBus.off('log', this.onLog);
    try {
      this.screen.destroy();
    } catch (error) {
      throw new TerminalError('Failed to restore the terminal', { cause: error });
    }
  }
}
