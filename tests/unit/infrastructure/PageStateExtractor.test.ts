import { Page } from 'playwright';
import { rankElements } from '../../../src/application/services/snapshot/RelevanceRanker';
import { TaskCancelledError } from '../../../src/domain/errors/AppErrors';
import { RawDomElement } from '../../../src/infrastructure/browser/DomWalkScript';
import { domRole, PageStateExtractor, toRecord } from '../../../src/infrastructure/browser/PageStateExtractor';
import { setGlobalLoggerConfig } from '../../../src/infrastructure/logging';

function raw(overrides: Partial<RawDomElement>): RawDomElement {
  return {
    role: '',
    tag: 'div',
    hasHref: false,
    text: '',
    attr: '',
    bbox: '0,0,10,10',
    selector: '',
    scrollInfo: '',
    ...overrides,
  };
}

const axTree = {
  nodes: [
    { nodeId: '1', role: { type: 'role', value: 'generic' }, childIds: ['2'] },
    {
      nodeId: '2',
      role: { type: 'role', value: 'button' },
      name: { type: 'computedString', value: 'Checkout' },
      boundingBox: { x: 0, y: 0, width: 80, height: 20 },
    },
  ],
};

interface FakeFrame {
  name: string;
  url: () => string;
  evaluate: jest.Mock<Promise<RawDomElement[]>, [unknown, number]>;
}

function frame(name: string, result: RawDomElement[] | Error, walked: string[]): FakeFrame {
  return {
    name,
    url: () => `https://shop.test/${name}`,
    evaluate: jest.fn<Promise<RawDomElement[]>, [unknown, number]>(async () => {
      walked.push(name);
      if (result instanceof Error) {
        throw result;
      }
      return result;
    }),
  };
}

describe('PageStateExtractor', () => {
  let walked: string[];
  let tree: unknown;
  let send: jest.Mock<Promise<unknown>, [string]>;
  let detach: jest.Mock<Promise<void>, []>;
  let newCDPSession: jest.Mock;
  let main: FakeFrame;
  let ads: FakeFrame;
  let cart: FakeFrame;
  let mockPage: Page;

  beforeAll(() => {
    setGlobalLoggerConfig({ customHandler: () => undefined });
  });

  afterAll(() => {
    setGlobalLoggerConfig({});
  });

  beforeEach(() => {
    walked = [];
    tree = axTree;
    send = jest.fn<Promise<unknown>, [string]>(async () => tree);
    detach = jest.fn<Promise<void>, []>(async () => undefined);
    newCDPSession = jest.fn().mockResolvedValue({ send, detach });
    main = frame('main', [raw({ tag: 'a', hasHref: true, text: 'Home', selector: '#home' })], walked);
    ads = frame('ads', new Error('Frame was detached'), walked);
    cart = frame('cart', [raw({ tag: 'input', attr: 'name:qty|type:number', selector: '[name="qty"]' })], walked);

    mockPage = {
      url: jest.fn().mockReturnValue('https://shop.test/'),
      title: jest.fn().mockResolvedValue('Shop'),
      innerText: jest.fn().mockResolvedValue('  Welcome to the shop  '),
      context: jest.fn().mockReturnValue({ newCDPSession }),
      mainFrame: jest.fn().mockReturnValue(main),
      frames: jest.fn().mockReturnValue([ads, main, cart]),
    } as unknown as Page;
  });

  function extractor(collectLimit = 200): PageStateExtractor {
    return new PageStateExtractor(() => mockPage, { collectLimit });
  }

  it('should build the snapshot from the accessibility tree first', async () => {
    const state = await extractor().capture();

    expect(send).toHaveBeenCalledWith('Accessibility.getFullAXTree');
    expect(detach).toHaveBeenCalledTimes(1);
    expect(walked).toEqual([]);
    expect(state.url).toBe('https://shop.test/');
    expect(state.title).toBe('Shop');
    expect(state.visibleText).toBe('Welcome to the shop');
    expect(state.elements.map(el => el.describe())).toEqual(['[1]button:"Checkout"']);
  });

  it('should walk the DOM only when the tree has no usable nodes', async () => {
    tree = { nodes: [] };

    const state = await extractor().capture();

    expect(walked).toEqual(['main', 'ads', 'cart']);
    expect(state.elements.map(el => `${el.index}:${el.role}:${el.selector}`)).toEqual([
      '1:link:#home',
      '2:textbox:[name="qty"]',
    ]);
  });

  it('should fall back to the DOM walk when no CDP session can be opened', async () => {
    newCDPSession.mockRejectedValue(new Error('CDP is only available in Chromium'));

    const state = await extractor().capture();

    expect(walked).toEqual(['main', 'ads', 'cart']);
    expect(state.elementCount).toBe(2);
  });

  it('should hand each frame only the budget that is left', async () => {
    tree = { nodes: [] };

    await extractor(2).capture();

    expect(main.evaluate.mock.calls[0][1]).toBe(2);
    expect(ads.evaluate.mock.calls[0][1]).toBe(1);
    expect(cart.evaluate.mock.calls[0][1]).toBe(1);
  });

  it('should return partial results when page reads fail', async () => {
    send.mockRejectedValue(new Error('Target closed'));
    mockPage = {
      url: jest.fn().mockReturnValue('https://shop.test/'),
      title: jest.fn().mockRejectedValue(new Error('Execution context was destroyed')),
      innerText: jest.fn().mockRejectedValue(new Error('Timeout 2000ms exceeded')),
      context: jest.fn().mockReturnValue({ newCDPSession }),
      mainFrame: jest.fn().mockReturnValue(main),
      frames: jest.fn().mockReturnValue([ads, main, cart]),
    } as unknown as Page;

    const state = await extractor().capture();

    expect(state.title).toBe('');
    expect(state.visibleText).toBe('');
    expect(state.elementCount).toBe(2);
    expect(detach).toHaveBeenCalledTimes(1);
  });

  it('should throw when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(extractor().capture(controller.signal)).rejects.toBeInstanceOf(TaskCancelledError);
  });
});

describe('domRole', () => {
  it.each([
    [{ tag: 'a', hasHref: true }, 'link'],
    [{ tag: 'a', hasHref: false }, 'a'],
    [{ tag: 'button' }, 'button'],
    [{ tag: 'select' }, 'combobox'],
    [{ tag: 'textarea' }, 'textbox'],
    [{ tag: 'input', attr: 'name:q|type:search' }, 'textbox'],
    [{ tag: 'input', attr: 'name:agree|type:checkbox' }, 'checkbox'],
    [{ tag: 'input', attr: 'type:radio' }, 'radio'],
    [{ tag: 'input', attr: 'type:submit' }, 'button'],
    [{ tag: 'input', attr: 'name:email' }, 'textbox'],
    [{ tag: 'div', role: 'tab' }, 'tab'],
    [{ tag: 'section' }, 'section'],
  ])('should map %p to %p', (overrides, expected) => {
    expect(domRole(raw(overrides))).toBe(expected);
  });

  it('should keep walked links and inputs ahead of the content cap', () => {
    const links = Array.from({ length: 80 }, (_, i) =>
      raw({ tag: 'a', hasHref: true, text: `Product ${i + 1}`, selector: `#p${i + 1}` })
    );
    const inputs = Array.from({ length: 5 }, (_, i) =>
      raw({ tag: 'input', attr: `name:f${i}|type:text`, selector: `[name="f${i}"]` })
    );

    const ranked = rankElements([...links, ...inputs].map(toRecord), { maxElements: 200, maxContentElements: 50 });

    expect(ranked).toHaveLength(85);
    expect(ranked.filter(el => el.role === 'textbox')).toHaveLength(5);
  });
});
