import { OAuth2Client } from 'google-auth-library';
import { drive_v3, google } from 'googleapis';
import { z } from 'zod';

import {
  GoogleService,
  GoogleServiceRetryConfig,
  GoogleServiceTimeoutConfig,
  ServiceContext,
} from './base/google-service.js';
import type { AuthClientSource } from './auth/auth-provider.interface.js';
import {
  GoogleDriveError,
  GoogleDriveCannotRemoveOwnerError,
  GoogleDriveFolderNotFoundError,
  GoogleDriveInvalidUserError,
  GoogleWorkspaceResult,
  GoogleErrorFactory,
  extractGoogleApiError,
  googleErr,
  googleOk,
} from '../errors/index.js';
import { PERMISSION_ROLES, PERMISSION_TYPES } from '../types/index.js';
import type { DriveFileInfo, Permission } from '../types/index.js';
import { createServiceLogger, Logger } from '../utils/logger.js';
import { validateInput } from '../utils/validation.utils.js';
import {
  DriveQueryBuilder,
  FOLDER_MIME_TYPE,
  SPREADSHEET_MIME_TYPE,
} from '../utils/drive-query-builder.js';

/** Fields requested for metadata listings */
export const FILE_LIST_FIELDS = 'files(id, name, parents), nextPageToken, incompleteSearch';
const METADATA_PAGE_SIZE = 500;

export type DriveListParams = Omit<drive_v3.Params$Resource$Files$List, 'pageToken'>;

const permissionSchema = z
  .object({
    role: z.enum(PERMISSION_ROLES),
    type: z.enum(PERMISSION_TYPES),
    emailAddress: z.string().min(1).optional(),
    domain: z.string().min(1).optional(),
    allowFileDiscovery: z.boolean().optional(),
    expirationTime: z.string().optional(),
    emailMessage: z.string().optional(),
    sendNotificationEmail: z.boolean().optional(),
    transferOwnership: z.boolean().optional(),
  })
  .refine(permission => !(permission.emailAddress && permission.domain), {
    message: 'A permission can only use emailAddress or domain. Do not specify both.',
  });

export type CreatePermissionOptions = z.input<typeof permissionSchema>;

/**
 * Google Drive Service
 *
 * Lists, copies, moves and exports spreadsheet files and manages their
 * permissions. Requests include shared drive items; with a shared drive
 * enabled, metadata listings search that drive first.
 */
export class DriveService extends GoogleService {
  private readonly authSource: AuthClientSource;
  private driveApi?: drive_v3.Drive;
  private initializingPromise: Promise<GoogleWorkspaceResult<void>> | null = null;
  private teamDriveId?: string;

  constructor(
    authSource: AuthClientSource,
    logger?: Logger,
    retryConfig?: GoogleServiceRetryConfig,
    timeoutConfig?: GoogleServiceTimeoutConfig
  ) {
    super(new OAuth2Client(), logger ?? createServiceLogger('drive-service'), retryConfig, timeoutConfig);
    this.authSource = authSource;
  }

  public getServiceName(): string {
    return 'DriveService';
  }

  public getServiceVersion(): string {
    return 'v3';
  }

  /**
   * Create the Drive client. Concurrent calls share one initialization.
   */
  public async initialize(): Promise<GoogleWorkspaceResult<void>> {
    if (this.driveApi) {
      return googleOk(undefined);
    }
    if (this.initializingPromise) {
      return this.initializingPromise;
    }

    const context = this.createContext('initialize');
    this.initializingPromise = this.executeWithRetry(async () => {
      const authResult = await this.authSource.getAuthClient();
      if (authResult.isErr()) {
        throw authResult.error;
      }

      this.auth = authResult.value;
      this.driveApi = google.drive({ version: 'v3', auth: authResult.value });
      this.logger.info('Drive service initialized successfully', {
        service: this.getServiceName(),
        version: this.getServiceVersion(),
      });
    }, context);

    try {
      return await this.initializingPromise;
    } finally {
      this.initializingPromise = null;
    }
  }

  public async healthCheck(): Promise<GoogleWorkspaceResult<boolean>> {
    const result = await this.listPage({ q: `mimeType='${SPREADSHEET_MIME_TYPE}'`, pageSize: 1 });
    if (result.isErr()) {
      this.logger.error('Drive health check failed', { error: result.error.toJSON() });
      return googleErr(result.error);
    }
    return googleOk(true);
  }

  /** Search this shared drive before the user's own files */
  public enableTeamDrive(teamDriveId: string): void {
    this.teamDriveId = teamDriveId;
  }

  public disableTeamDrive(): void {
    this.teamDriveId = undefined;
  }

  /**
   * `files.list`, following `nextPageToken` until every page is read
   */
  public async listFiles(params: DriveListParams = {}): Promise<GoogleWorkspaceResult<DriveFileInfo[]>> {
    const context = this.createContext('listFiles', { query: params.q });

    return this.executeAsyncWithRetry(async () => {
      const drive = await this.ensureInitialized();
      const files: DriveFileInfo[] = [];
      let pageToken: string | undefined;
      let incompleteSearch = false;

      do {
        const response = await drive.files.list({
          supportsAllDrives: true,
          includeItemsFromAllDrives: true,
          ...params,
          pageToken,
        });
        files.push(...(response.data.files ?? []).map(toFileInfo));
        incompleteSearch = response.data.incompleteSearch ?? false;
        pageToken = response.data.nextPageToken ?? undefined;
      } while (pageToken);

      if (incompleteSearch) {
        this.logger.warn(
          `Not all files in the corpora ${params.corpora ?? 'user'} were searched. As a result the response might be incomplete.`,
          { requestId: context.requestId }
        );
      }
      return files;
    }, context);
  }

  /**
   * Titles, ids and parents of spreadsheets, optionally filtered by a Drive query
   */
  public async spreadsheetMetadata(
    query = '',
    onlyTeamDrive = false
  ): Promise<GoogleWorkspaceResult<DriveFileInfo[]>> {
    return this.metadataForMimeType(SPREADSHEET_MIME_TYPE, query, onlyTeamDrive);
  }

  public async folderMetadata(query = '', onlyTeamDrive = false): Promise<GoogleWorkspaceResult<DriveFileInfo[]>> {
    return this.metadataForMimeType(FOLDER_MIME_TYPE, query, onlyTeamDrive);
  }

  /** RFC 3339 time of the last modification */
  public async getModifiedTime(fileId: string): Promise<GoogleWorkspaceResult<string>> {
    const context = this.createContext('getModifiedTime', { fileId });

    return this.executeAsyncWithRetry(async () => {
      const drive = await this.ensureInitialized();
      const response = await drive.files.get({ fileId, fields: 'modifiedTime', supportsAllDrives: true });
      return response.data.modifiedTime ?? '';
    }, context);
  }

  /** Ids of the folders holding a file */
  public async getFileParents(fileId: string): Promise<GoogleWorkspaceResult<string[]>> {
    const context = this.createContext('getFileParents', { fileId });

    return this.executeAsyncWithRetry(async () => {
      const drive = await this.ensureInitialized();
      const response = await drive.files.get({ fileId, fields: 'parents', supportsAllDrives: true });
      return response.data.parents ?? [];
    }, context);
  }

  /**
   * Permanently delete a file, skipping the trash
   */
  public async deleteFile(fileId: string): Promise<GoogleWorkspaceResult<void>> {
    const context = this.createContext('deleteFile', { fileId });

    return this.executeAsyncWithRetry(async () => {
      const drive = await this.ensureInitialized();
      await drive.files.delete({ fileId, supportsAllDrives: true });
      this.logger.info('Deleted file', { fileId, requestId: context.requestId });
    }, context);
  }

  public async copyFile(
    fileId: string,
    title: string,
    folderId?: string
  ): Promise<GoogleWorkspaceResult<DriveFileInfo>> {
    const context = this.createContext('copyFile', { fileId, parentFolderId: folderId });

    return this.executeAsyncWithRetry(async () => {
      const drive = await this.ensureInitialized();
      const response = await drive.files.copy({
        fileId,
        supportsAllDrives: true,
        requestBody: { name: title, ...(folderId ? { parents: [folderId] } : {}) },
      });
      return toFileInfo(response.data);
    }, context);
  }

  /**
   * Move a file between folders. The current folder must be given because
   * Drive removes parents explicitly.
   */
  public async moveFile(
    fileId: string,
    oldFolderId: string,
    newFolderId: string
  ): Promise<GoogleWorkspaceResult<DriveFileInfo>> {
    const context = this.createContext('moveFile', { fileId, parentFolderId: newFolderId });

    return this.executeAsyncWithRetry(async () => {
      const drive = await this.ensureInitialized();
      const response = await drive.files.update({
        fileId,
        removeParents: oldFolderId,
        addParents: newFolderId,
        supportsAllDrives: true,
        fields: 'id, name, parents',
      });
      return toFileInfo(response.data);
    }, context);
  }

  /** Resolves to the id of the new folder */
  public async createFolder(name: string, parentId?: string): Promise<GoogleWorkspaceResult<string>> {
    const context = this.createContext('createFolder', { parentFolderId: parentId });

    return this.executeAsyncWithRetry(async () => {
      const drive = await this.ensureInitialized();
      const response = await drive.files.create({
        supportsAllDrives: true,
        requestBody: {
          name,
          mimeType: FOLDER_MIME_TYPE,
          ...(parentId ? { parents: [parentId] } : {}),
        },
      });
      return response.data.id ?? '';
    }, context);
  }

  /**
   * Id of the first folder with exactly this name
   */
  public async getFolderId(name: string): Promise<GoogleWorkspaceResult<string>> {
    const folders = await this.folderMetadata();
    return folders.andThen(list => {
      const folder = list.find(entry => entry.name === name);
      return folder ? googleOk(folder.id) : googleErr(new GoogleDriveFolderNotFoundError(name));
    });
  }

  /**
   * Export a file to `mimeType` and return the bytes. Drive limits exports
   * to 10 MB.
   */
  public async exportFile(fileId: string, mimeType: string): Promise<GoogleWorkspaceResult<Buffer>> {
    const context = this.createContext('exportFile', { fileId, mimeType });

    return this.executeAsyncWithRetry(async () => {
      const drive = await this.ensureInitialized();
      const response = await drive.files.export({ fileId, mimeType }, { responseType: 'arraybuffer' });
      return toBuffer(response.data);
    }, context);
  }

  /**
   * Grant access to a file. Exactly one of `emailAddress` and `domain` may
   * be given.
   */
  public async createPermission(
    fileId: string,
    options: CreatePermissionOptions
  ): Promise<GoogleWorkspaceResult<Permission>> {
    const validation = validateInput(permissionSchema, options, { fileId });
    if (validation.isErr()) {
      return googleErr(validation.error);
    }

    const { emailMessage, sendNotificationEmail, transferOwnership, ...permission } = validation.value;
    const context = this.createContext('createPermission', { fileId, role: permission.role, type: permission.type });

    return this.executeAsyncWithRetry(async () => {
      const drive = await this.ensureInitialized();
      try {
        const response = await drive.permissions.create({
          fileId,
          supportsAllDrives: true,
          emailMessage,
          sendNotificationEmail,
          transferOwnership,
          requestBody: { kind: 'drive#permission', ...permission },
        });
        return toPermission(response.data);
      } catch (error) {
        const normalized = extractGoogleApiError(error);
        if (normalized.reason === 'invalidSharingRequest') {
          throw new GoogleDriveInvalidUserError(
            normalized.message,
            fileId,
            error instanceof Error ? error : undefined
          );
        }
        throw error;
      }
    }, context);
  }

  /**
   * Every permission of a file, all fields included
   */
  public async listPermissions(fileId: string): Promise<GoogleWorkspaceResult<Permission[]>> {
    const context = this.createContext('listPermissions', { fileId });

    return this.executeAsyncWithRetry(async () => {
      const drive = await this.ensureInitialized();
      const permissions: Permission[] = [];
      let pageToken: string | undefined;

      do {
        const response = await drive.permissions.list({
          fileId,
          fields: '*',
          supportsAllDrives: true,
          pageToken,
        });
        permissions.push(...(response.data.permissions ?? []).map(toPermission));
        pageToken = response.data.nextPageToken ?? undefined;
      } while (pageToken);

      return permissions;
    }, context);
  }

  public async deletePermission(fileId: string, permissionId: string): Promise<GoogleWorkspaceResult<void>> {
    const context = this.createContext('deletePermission', { fileId, permissionId });

    return this.executeAsyncWithRetry(async () => {
      const drive = await this.ensureInitialized();
      try {
        await drive.permissions.delete({ fileId, permissionId, supportsAllDrives: true });
      } catch (error) {
        if (/The owner of a file cannot be removed\./.test(extractGoogleApiError(error).message)) {
          throw new GoogleDriveCannotRemoveOwnerError(
            fileId,
            permissionId,
            error instanceof Error ? error : undefined
          );
        }
        throw error;
      }
    }, context);
  }

  protected convertServiceSpecificError(error: Error, context: ServiceContext): GoogleDriveError | null {
    const fileId = context.data?.fileId;
    const folderId = context.data?.parentFolderId;
    return GoogleErrorFactory.createDriveError(
      error,
      typeof fileId === 'string' ? fileId : undefined,
      typeof folderId === 'string' ? folderId : undefined
    );
  }

  private async metadataForMimeType(
    mimeType: string,
    query: string,
    onlyTeamDrive: boolean
  ): Promise<GoogleWorkspaceResult<DriveFileInfo[]>> {
    let q: string;
    try {
      q = new DriveQueryBuilder().withCustomQuery(query).withMimeType(mimeType).build();
    } catch (error) {
      return googleErr(
        new GoogleDriveError(
          error instanceof Error ? error.message : String(error),
          'GOOGLE_DRIVE_INVALID_QUERY',
          400,
          undefined,
          undefined,
          { query }
        )
      );
    }

    const params: DriveListParams = {
      fields: FILE_LIST_FIELDS,
      q,
      pageSize: METADATA_PAGE_SIZE,
      orderBy: 'recency',
    };

    if (!this.teamDriveId) {
      return this.listFiles(params);
    }

    const teamDriveResult = await this.listFiles({ ...params, corpora: 'drive', driveId: this.teamDriveId });
    if (teamDriveResult.isErr() || teamDriveResult.value.length > 0 || onlyTeamDrive) {
      return teamDriveResult;
    }
    return this.listFiles(params);
  }

  private async listPage(params: DriveListParams): Promise<GoogleWorkspaceResult<drive_v3.Schema$FileList>> {
    const context = this.createContext('listPage', { query: params.q });
    return this.executeAsyncWithRetry(async () => {
      const drive = await this.ensureInitialized();
      const response = await drive.files.list({ supportsAllDrives: true, includeItemsFromAllDrives: true, ...params });
      return response.data;
    }, context);
  }

  private async ensureInitialized(): Promise<drive_v3.Drive> {
    const result = await this.initialize();
    if (result.isErr()) {
      throw result.error;
    }
    if (!this.driveApi) {
      throw new GoogleDriveError('Drive API not initialized', 'GOOGLE_DRIVE_NOT_INITIALIZED', 500);
    }
    return this.driveApi;
  }
}

function toFileInfo(file: drive_v3.Schema$File): DriveFileInfo {
  return {
    id: file.id ?? '',
    name: file.name ?? '',
    ...(file.parents ? { parents: file.parents } : {}),
    ...(file.modifiedTime ? { modifiedTime: file.modifiedTime } : {}),
  };
}

function toPermission(permission: drive_v3.Schema$Permission): Permission {
  return {
    id: permission.id ?? '',
    type: permission.type ?? '',
    role: permission.role ?? '',
    ...(permission.emailAddress ? { emailAddress: permission.emailAddress } : {}),
    ...(permission.domain ? { domain: permission.domain } : {}),
    ...(permission.displayName ? { displayName: permission.displayName } : {}),
    ...(permission.expirationTime ? { expirationTime: permission.expirationTime } : {}),
  };
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (typeof data === 'string') {
    return Buffer.from(data, 'utf8');
  }
  return Buffer.alloc(0);
}
