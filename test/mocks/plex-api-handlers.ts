import { HttpResponse, http } from 'msw'

/**
 * Default MSW handlers for a Plex server and plex.tv
 *
 * The Home has an owner plus two managed users. Switching into a user yields
 * `account-token-<id>`, which plex.tv trades for `server-token-<id>`.
 * Tests override individual endpoints with server.use().
 */

export const PLEX_SERVER_URL = 'http://plex.test:32400'
export const PLEX_MACHINE_ID = 'test-machine-id'

const xml = (body: string) =>
  HttpResponse.text(`<?xml version="1.0" encoding="UTF-8"?>${body}`, {
    headers: { 'Content-Type': 'text/xml; charset=utf-8' },
  })

export const plexIdentityHandler = http.get(
  `${PLEX_SERVER_URL}/identity`,
  () =>
    HttpResponse.json({
      MediaContainer: { machineIdentifier: PLEX_MACHINE_ID, version: '1.40.0' },
    }),
)

export const plexSectionsHandler = http.get(
  `${PLEX_SERVER_URL}/library/sections`,
  () =>
    HttpResponse.json({
      MediaContainer: {
        Directory: [
          { key: '1', type: 'movie', title: 'Movies' },
          { key: '3', type: 'artist', title: 'Music' },
        ],
      },
    }),
)

export const plexHomeUsersHandler = http.get(
  'https://plex.tv/api/home/users',
  () =>
    xml(
      '<MediaContainer size="3">' +
        '<User id="10" title="owner" username="owner-account" admin="1" />' +
        '<User id="11" title="alice" admin="0" />' +
        '<User id="12" title="Bob" username="bobby" admin="0" />' +
        '</MediaContainer>',
    ),
)

export const plexSwitchUserHandler = http.post(
  'https://plex.tv/api/home/users/:userId/switch',
  ({ params }) =>
    xml(`<user id="${String(params.userId)}" authToken="account-token-${String(params.userId)}" />`),
)

export const plexResourcesHandler = http.get(
  'https://plex.tv/api/v2/resources',
  ({ request }) => {
    const accountToken = request.headers.get('X-Plex-Token') ?? ''
    const userId = accountToken.replace('account-token-', '')
    return HttpResponse.json([
      {
        name: 'Other Server',
        clientIdentifier: 'other-machine-id',
        provides: 'server',
        accessToken: 'wrong-server-token',
      },
      {
        name: 'Test Plex Server',
        clientIdentifier: PLEX_MACHINE_ID,
        provides: 'server',
        accessToken: `server-token-${userId}`,
      },
    ])
  },
)

export const plexApiHandlers = [
  plexIdentityHandler,
  plexSectionsHandler,
  plexHomeUsersHandler,
  plexSwitchUserHandler,
  plexResourcesHandler,
]
