import type { AbsolutePath, Alias, BaseError } from "@cmdlink/core"
import type { ZodError } from "zod"

export interface ValidationError extends BaseError {
	type: "validation"
	source: "manual"
	field: string
}

export interface IoError extends BaseError {
	type: "io"
	path: AbsolutePath
	operation: string
	code?: string
}

export interface ProjectDirCreationError extends BaseError {
	type: "project_dir_creation"
	path: AbsolutePath
}

export interface ConfigReadError extends BaseError {
	type: "config_read"
	path: AbsolutePath
}

export interface ConfigWriteError extends BaseError {
	type: "config_write"
	path: AbsolutePath
}

export interface ConfigParseError extends BaseError {
	type: "config_parse"
	path: AbsolutePath
	key?: string
	zodError?: ZodError
}

export interface ConfigSerializeError extends BaseError {
	type: "config_serialize"
	path: AbsolutePath
}

export interface LinkAlreadyExistsError extends BaseError {
	type: "link_already_exists"
	alias: Alias
	path: AbsolutePath
}

export interface LinkCreationError extends BaseError {
	type: "link_creation"
	alias: Alias
	path: AbsolutePath
}

export interface LinkUpdateError extends BaseError {
	type: "link_update"
	alias: Alias
	path: AbsolutePath
}

export interface LinkRemovalError extends BaseError {
	type: "link_removal"
	alias: Alias
	path: AbsolutePath
}

export interface AliasExistsError extends BaseError {
	type: "alias_exists"
	alias: Alias
}

export type ConfigError =
	| ConfigReadError
	| ConfigWriteError
	| ConfigParseError
	| ConfigSerializeError

export type LinkError =
	| LinkAlreadyExistsError
	| LinkCreationError
	| LinkUpdateError
	| LinkRemovalError

export type CmdlinkError =
	| ValidationError
	| IoError
	| ProjectDirCreationError
	| ConfigError
	| LinkError
	| AliasExistsError
