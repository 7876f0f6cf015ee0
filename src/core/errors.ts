/** 权限配置或求值过程中抛出的错误基类。 */
export class PermissionConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** addPermission / isMember 引用了不存在的组。 */
export class UnknownGroupError extends PermissionConfigError {
  readonly groupName: string;
  readonly contentType: string | null;

  constructor(groupName: string, contentType: string | null = null) {
    super(
      contentType
        ? `There is no group named '${groupName}' for content type '${contentType}'.`
        : `There is no group named '${groupName}'.`,
    );
    this.groupName = groupName;
    this.contentType = contentType;
  }
}

/** 未开启 allowReusingGroupNames 时，同名组被绑定到另一种内容类型。 */
export class DuplicateGroupNameError extends PermissionConfigError {
  readonly groupName: string;
  readonly existingContentType: string;
  readonly contentType: string;

  constructor(groupName: string, existingContentType: string, contentType: string) {
    super(
      `The group '${groupName}' is already bound to content type '${existingContentType}' and cannot be reused for '${contentType}'. Enable allowReusingGroupNames to bind one name to several content types.`,
    );
    this.groupName = groupName;
    this.existingContentType = existingContentType;
    this.contentType = contentType;
  }
}

/** 组的 match 谓词被用于不属于其内容类型的条目。 */
export class TypeMismatchError extends PermissionConfigError {
  readonly groupName: string;
  readonly expectedContentType: string;

  constructor(groupName: string, expectedContentType: string, detail?: string) {
    super(
      `The security group '${groupName}' is not relevant to this content. It can only be applied to content of type '${expectedContentType}'${detail ? ` (${detail})` : ''}.`,
    );
    this.groupName = groupName;
    this.expectedContentType = expectedContentType;
  }
}

/** 复用组名时，调用方未按内容类型消歧，导致匹配到多个组。 */
export class AmbiguousGroupNameError extends PermissionConfigError {
  readonly groupName: string;
  readonly contentTypes: string[];

  constructor(groupName: string, contentTypes: string[]) {
    super(
      `The group name '${groupName}' is bound to several content types (${contentTypes.join(', ')}); specify the content type.`,
    );
    this.groupName = groupName;
    this.contentTypes = contentTypes;
  }
}

/** 在 build() 之后继续修改组注册表。 */
export class RegistryFrozenError extends PermissionConfigError {
  constructor() {
    super('The group registry is frozen. Declare groups and permissions before calling build().');
  }
}
