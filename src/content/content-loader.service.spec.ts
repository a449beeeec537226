import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ContentLoaderService } from './content-loader.service.js';
import { CombatConfigService } from '../config/combat-config.service.js';
import { ContentError } from '../common/errors/game-errors.js';

function makeLoader(contentDir: string): ContentLoaderService {
  const config = new CombatConfigService();
  config.update({ contentDir });
  return new ContentLoaderService(config);
}

describe('ContentLoaderService', () => {
  it('저장소 content/actions.json 로드', async () => {
    const loader = makeLoader(join(process.cwd(), 'content'));
    await loader.onModuleInit();

    expect(loader.getActions()).toHaveLength(27);
    expect(loader.getAction('melee')).toEqual({
      id: 'melee',
      name: 'Attack (Melee)',
      suit: 'swords',
      attribute: 'swords',
      description: 'Strike an enemy in your zone with a melee weapon.',
      requiresTarget: true,
      targetType: 'enemy',
    });
    expect(loader.getAction('vigilance')?.suit).toBe('misc');
    expect(loader.getAction('move')?.allowMinor).toBe(false);
  });

  describe('잘못된 콘텐츠', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'combat-content-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('파일 없음 → ContentError', async () => {
      const loader = makeLoader(dir);
      await expect(loader.loadAll()).rejects.toThrow(ContentError);
    });

    it('JSON 파싱 실패 → ContentError', async () => {
      await writeFile(join(dir, 'actions.json'), '[{ broken', 'utf-8');
      const loader = makeLoader(dir);
      await expect(loader.loadAll()).rejects.toThrow('not valid JSON');
    });

    it('알 수 없는 action id → ContentError', async () => {
      await writeFile(
        join(dir, 'actions.json'),
        JSON.stringify([
          {
            id: 'fireball',
            name: 'Fireball',
            suit: 'wands',
            attribute: 'wands',
            description: '',
            requiresTarget: true,
          },
        ]),
        'utf-8',
      );
      const loader = makeLoader(dir);
      await expect(loader.loadAll()).rejects.toThrow('Invalid action catalog');
    });
  });

  it('중복 id → ContentError', () => {
    const loader = makeLoader(join(process.cwd(), 'content'));
    const move = {
      id: 'move',
      name: 'Move',
      suit: 'misc',
      attribute: null,
      description: '',
      requiresTarget: false,
    };
    expect(() => loader.setActions([move, move])).toThrow(
      'Duplicate action id: move',
    );
  });
});
