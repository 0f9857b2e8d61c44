import { extname, isAbsolute, relative, resolve, sep } from 'path';
import { ConfigError } from '../../common/errors/pipeline.errors';

export interface InputPolicy {
  /** 小写、带点的扩展名，如 .mp3 */
  allowedExtensions: string[];
  /** 本地文件必须位于该目录下；为空时不接受本地路径 */
  root: string | null;
  /** 允许的远程协议（不含冒号）；为空时不接受 URL */
  allowedSchemes: string[];
}

const URL_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * 校验输入引用并返回交给解码器的规范形式
 * 本地路径解析为 root 下的绝对路径，URL 原样返回
 */
export function resolveInputRef(raw: string | undefined, policy: InputPolicy): string {
  const inputRef = (raw ?? '').trim();
  if (!inputRef) {
    throw new ConfigError('input_ref must not be empty');
  }

  let resolved: string;
  let pathname: string;

  if (URL_PATTERN.test(inputRef)) {
    let url: URL;
    try {
      url = new URL(inputRef);
    } catch {
      throw new ConfigError(`input_ref is not a valid URL: ${inputRef}`);
    }
    const scheme = url.protocol.slice(0, -1).toLowerCase();
    if (!policy.allowedSchemes.includes(scheme)) {
      throw new ConfigError(`Input scheme not allowed: ${scheme}`);
    }
    resolved = inputRef;
    pathname = url.pathname;
  } else {
    if (!policy.root) {
      throw new ConfigError('Local input files are disabled (INPUT_ROOT is not set)');
    }
    const root = resolve(policy.root);
    resolved = resolve(root, inputRef);
    const inside = relative(root, resolved);
    if (!inside || inside === '..' || inside.startsWith(`..${sep}`) || isAbsolute(inside)) {
      throw new ConfigError(`input_ref must point to a file under ${root}`);
    }
    pathname = resolved;
  }

  const extension = extname(pathname).toLowerCase();
  if (!policy.allowedExtensions.includes(extension)) {
    throw new ConfigError(`Unsupported input format: ${extension || '(none)'}`);
  }

  return resolved;
}
