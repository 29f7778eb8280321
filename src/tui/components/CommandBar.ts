import blessed from 'blessed';
import { KEY_HELP } from '../../core/keymap';

export class CommandBar {
  widget: blessed.Widgets.BoxElement;

  constructor(screen: blessed.Widgets.Screen, commandBarHeight: number) {
    this.widget = blessed.box({
      parent: screen,
      bottom: 0,
      left: 0,
      width: '100%',
      height: commandBarHeight,
      border: { type: 'line' },
      style: { border: { fg: 'gray' } },
      tags: true
    });
  }

  update(lastMessage: string | undefined) {
    const status = lastMessage ? ` | {grey-fg}${lastMessage}{/}` : '';
    this.widget.setContent(`${KEY_HELP}${status}`);
  }
}
