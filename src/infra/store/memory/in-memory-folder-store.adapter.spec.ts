import { BusinessException } from '../../../common/exceptions/business.exception';
import { InMemoryFolderStoreAdapter } from './in-memory-folder-store.adapter';

/**
 * ============================================================
 * 📦 인메모리 폴더 저장소 어댑터 테스트
 * ============================================================
 *
 * 🎯 테스트 대상:
 *   - InMemoryFolderStoreAdapter
 *
 * 📋 비즈니스 맥락:
 *   - 외부 저장소를 대신하는 프로세스 내 구현체로, 실제 저장소처럼
 *     같은 이름의 폴더를 중복 생성할 수 있어야 한다.
 * ============================================================
 */
describe('InMemoryFolderStoreAdapter', () => {
  let store: InMemoryFolderStoreAdapter;

  beforeEach(() => {
    store = new InMemoryFolderStoreAdapter('root');
  });

  it('같은 이름과 부모로 두 번 생성하면 폴더가 두 개 생겨야 한다', async () => {
    // 🎬 WHEN
    const first = await store.createFolder('Companies', 'root');
    const second = await store.createFolder('Companies', 'root');

    // ✅ THEN
    expect(first.id).not.toBe(second.id);
    expect(store.findFolders('root', 'Companies')).toHaveLength(2);
    expect(store.createdFolderCount).toBe(2);
  });

  it('listChildren은 직접 하위 항목만 생성 순서대로 반환해야 한다', async () => {
    // 📥 GIVEN
    const a = await store.createFolder('A', 'root');
    await store.createFolder('A-1', a.id);
    await store.createFile({ content: Buffer.from('hello'), name: 'note.txt', mimeType: 'text/plain', parentId: 'root' });

    // 🎬 WHEN
    const children = await store.listChildren('root');

    // ✅ THEN
    expect(children.map((c) => [c.name, c.kind])).toEqual([
      ['A', 'folder'],
      ['note.txt', 'file'],
    ]);
    expect(children[1].size).toBe(5);
  });

  it('휴지통 항목은 목록에서 빠지지만 getItem으로는 조회되어야 한다', async () => {
    const folder = await store.createFolder('Trash me', 'root');

    store.trashItem(folder.id);

    expect(await store.listChildren('root')).toEqual([]);
    expect((await store.getItem(folder.id))?.trashed).toBe(true);
  });

  it('removeItem은 하위 항목까지 함께 제거해야 한다', async () => {
    const parent = await store.createFolder('P', 'root');
    const child = await store.createFolder('C', parent.id);

    store.removeItem(parent.id);

    expect(await store.getItem(parent.id)).toBeNull();
    expect(await store.getItem(child.id)).toBeNull();
    expect(store.countFolders()).toBe(0);
  });

  it('존재하지 않는 부모에 폴더를 만들면 STORE_ITEM_NOT_FOUND로 실패해야 한다', async () => {
    await expect(store.createFolder('X', 'missing')).rejects.toMatchObject({ errorCode: 6003 });
    await expect(store.createFolder('X', 'missing')).rejects.toBeInstanceOf(BusinessException);
  });

  it('주입한 장애는 지정한 횟수만큼만 발생해야 한다', async () => {
    store.injectFailure('listChildren', new Error('network down'));

    await expect(store.listChildren('root')).rejects.toThrow('network down');
    await expect(store.listChildren('root')).resolves.toEqual([]);
  });

  it('renameItem은 이름을 바꾸고 부모 정보를 유지해야 한다', async () => {
    const folder = await store.createFolder('Old', 'root');

    const renamed = await store.renameItem(folder.id, 'New');

    expect(renamed.name).toBe('New');
    expect(renamed.parentIds).toEqual(['root']);
  });
});
