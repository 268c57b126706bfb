import { MockAgent } from 'undici';
import { SubsonicClient, generateSalt, tokenFor } from './client';

const SERVER = 'https://music.example.com';

function ok(body: Record<string, unknown> = {}) {
  return { 'subsonic-response': { status: 'ok', version: '1.16.1', ...body } };
}

function endpoint(name: string) {
  return (path: string) => path.startsWith(`/rest/${name}?`);
}

describe('auth helpers', () => {
  it('should hash password and salt with md5', () => {
    expect(tokenFor('sesame', 'c19b2d')).toBe('26719a1196d2a940705a59634eb18eab');
  });

  it('should generate 12 alphanumeric characters', () => {
    const salt = generateSalt();

    expect(salt).toMatch(/^[A-Za-z0-9]{12}$/);
  });
});

describe('SubsonicClient', () => {
  let mockAgent: MockAgent;
  let client: SubsonicClient;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    client = new SubsonicClient({
      serverUrl: `${SERVER}/`,
      username: 'listener',
      password: 'test-secret',
      dispatcher: mockAgent,
    });
  });

  afterEach(async () => {
    await client.close();
    await mockAgent.close();
  });

  it('should sign every request with a salted token', async () => {
    let query = '';
    mockAgent
      .get(SERVER)
      .intercept({
        path: (path) => {
          query = path;
          return path.startsWith('/rest/ping?');
        },
        method: 'GET',
      })
      .reply(200, ok());

    await expect(client.ping()).resolves.toBe(true);

    const params = new URL(query, SERVER).searchParams;
    const salt = params.get('s') ?? '';
    expect(params.get('u')).toBe('listener');
    expect(params.get('t')).toBe(tokenFor('test-secret', salt));
    expect(salt).toHaveLength(12);
    expect(params.get('v')).toBe('1.16.1');
    expect(params.get('c')).toBe('streamcast');
    expect(params.get('f')).toBe('json');
  });

  it('should list genres', async () => {
    mockAgent
      .get(SERVER)
      .intercept({ path: endpoint('getGenres'), method: 'GET' })
      .reply(200, ok({ genres: { genre: [{ value: 'Jazz', songCount: 12 }, { value: 'Rock', songCount: 40 }] } }));

    const genres = await client.getGenres();

    expect(genres.map((g) => g.value)).toEqual(['Jazz', 'Rock']);
  });

  it('should normalize a single object into a one-element list', async () => {
    mockAgent
      .get(SERVER)
      .intercept({ path: endpoint('getRandomSongs'), method: 'GET' })
      .reply(200, ok({ randomSongs: { song: { id: 7, title: 'Blue in Green', artist: 'Miles Davis' } } }));

    const songs = await client.getRandomSongs(1);

    expect(songs).toEqual([{ id: '7', title: 'Blue in Green', artist: 'Miles Davis' }]);
  });

  it('should pass genre filters and paging', async () => {
    let query = '';
    mockAgent
      .get(SERVER)
      .intercept({
        path: (path) => {
          query = path;
          return path.startsWith('/rest/getSongsByGenre?');
        },
        method: 'GET',
      })
      .reply(200, ok({ songsByGenre: { song: [] } }));

    await expect(client.getSongsByGenre('Hip Hop')).resolves.toEqual([]);

    const params = new URL(query, SERVER).searchParams;
    expect(params.get('genre')).toBe('Hip Hop');
    expect(params.get('count')).toBe('50');
    expect(params.get('offset')).toBe('0');
  });

  it('should flatten artists across index letters', async () => {
    mockAgent
      .get(SERVER)
      .intercept({ path: endpoint('getArtists'), method: 'GET' })
      .reply(
        200,
        ok({
          artists: {
            index: [
              { name: 'A', artist: [{ id: 'ar-1', name: 'Air' }, { id: 'ar-2', name: 'Arca' }] },
              { name: 'B', artist: { id: 'ar-3', name: 'Bjork' } },
            ],
          },
        }),
      );

    const artists = await client.getArtists();

    expect(artists.map((a) => a.name)).toEqual(['Air', 'Arca', 'Bjork']);
  });

  it('should read playlist songs from entry', async () => {
    mockAgent
      .get(SERVER)
      .intercept({ path: endpoint('getPlaylist'), method: 'GET' })
      .reply(200, ok({ playlist: { id: 'pl-1', name: 'Morning', entry: [{ id: 's1', title: 'One' }, { id: 's2', title: 'Two' }] } }));

    const songs = await client.getPlaylistSongs('pl-1');

    expect(songs.map((s) => s.id)).toEqual(['s1', 's2']);
  });

  it('should use the alphabetical album list without an artist', async () => {
    let query = '';
    mockAgent
      .get(SERVER)
      .intercept({
        path: (path) => {
          query = path;
          return path.startsWith('/rest/getAlbumList2?');
        },
        method: 'GET',
      })
      .reply(200, ok({ albumList2: { album: [{ id: 'al-1', name: 'Kind of Blue' }] } }));

    const albums = await client.getAlbums();

    expect(albums.map((a) => a.name)).toEqual(['Kind of Blue']);
    expect(new URL(query, SERVER).searchParams.get('type')).toBe('alphabeticalByName');
    expect(new URL(query, SERVER).searchParams.get('size')).toBe('500');
  });

  it('should look up a single song', async () => {
    mockAgent
      .get(SERVER)
      .intercept({ path: endpoint('getSong'), method: 'GET' })
      .reply(200, ok({ song: { id: 's9', title: 'So What', artist: 'Miles Davis' } }));

    const song = await client.getSong('s9');

    expect(song).toEqual({ id: 's9', title: 'So What', artist: 'Miles Davis' });
  });

  it('should split search results', async () => {
    mockAgent
      .get(SERVER)
      .intercept({ path: endpoint('search3'), method: 'GET' })
      .reply(200, ok({ searchResult3: { song: [{ id: 's9', title: 'So What' }], album: { id: 'al-1', name: 'Kind of Blue' } } }));

    const results = await client.search('blue');

    expect(results.artists).toEqual([]);
    expect(results.albums.map((a) => a.id)).toEqual(['al-1']);
    expect(results.songs.map((s) => s.title)).toEqual(['So What']);
  });

  it('should fail soft on a failed status', async () => {
    mockAgent
      .get(SERVER)
      .intercept({ path: endpoint('getPlaylists'), method: 'GET' })
      .reply(200, { 'subsonic-response': { status: 'failed', error: { code: 40, message: 'Wrong username or password' } } });

    await expect(client.getPlaylists()).resolves.toEqual([]);
    expect(client.lastError).toBe('SUBSONIC_API_ERROR');
  });

  it('should fail soft on HTTP errors', async () => {
    mockAgent.get(SERVER).intercept({ path: endpoint('ping'), method: 'GET' }).reply(502, 'Bad Gateway');

    await expect(client.ping()).resolves.toBe(false);
    expect(client.lastError).toBe('SUBSONIC_HTTP_ERROR');
  });

  it('should fail soft on bodies without an envelope', async () => {
    mockAgent.get(SERVER).intercept({ path: endpoint('getGenres'), method: 'GET' }).reply(200, { hello: 'world' });

    await expect(client.getGenres()).resolves.toEqual([]);
    expect(client.lastError).toBe('SUBSONIC_INVALID_RESPONSE');
  });

  it('should fail soft when the server is unreachable', async () => {
    mockAgent
      .get(SERVER)
      .intercept({ path: endpoint('getAlbum'), method: 'GET' })
      .replyWithError(Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }));

    await expect(client.getAlbumSongs('al-1')).resolves.toEqual([]);
    expect(client.lastError).toBe('SUBSONIC_HTTP_ERROR');
  });

  it('should build self-authenticating stream and cover art URLs', () => {
    const stream = new URL(client.getStreamUrl('s9'));
    const cover = new URL(client.getCoverArtUrl('al-1'));

    expect(stream.origin + stream.pathname).toBe('https://music.example.com/rest/stream');
    expect(stream.searchParams.get('id')).toBe('s9');
    expect(stream.searchParams.get('format')).toBe('mp3');
    expect(stream.searchParams.get('t')).toBe(tokenFor('test-secret', stream.searchParams.get('s') ?? ''));
    expect(cover.pathname).toBe('/rest/getCoverArt');
    expect(cover.searchParams.get('size')).toBe('300');
  });
});
