/**
 * @fileoverview Repository contract rule
 *
 * Every member of a domain repository contract must report failure through
 * its return type: `Result<F, T>`, `Promise<Result<F, T>>` or one of the
 * configured aliases.
 */

import * as ts from 'typescript';

export interface ContractProblem {
  readonly line: number;
  readonly message: string;
}

function typeName(name: ts.EntityName): string {
  return ts.isIdentifier(name) ? name.text : name.right.text;
}

function isResultType(node: ts.TypeNode, resultTypes: ReadonlySet<string>): boolean {
  if (ts.isParenthesizedTypeNode(node)) {
    return isResultType(node.type, resultTypes);
  }
  if (!ts.isTypeReferenceNode(node)) {
    return false;
  }

  const name = typeName(node.typeName);
  if (resultTypes.has(name)) {
    return true;
  }
  if (name === 'Promise' || name === 'PromiseLike') {
    const [inner] = node.typeArguments ?? [];
    return inner !== undefined && isResultType(inner, resultTypes);
  }
  return false;
}

function memberName(member: ts.ClassElement | ts.TypeElement, source: ts.SourceFile): string {
  const { name } = member;
  if (!name) return '(anonymous)';
  return ts.isIdentifier(name) || ts.isStringLiteral(name) ? name.text : name.getText(source);
}

function isPrivate(member: ts.ClassElement): boolean {
  return (
    (ts.getCombinedModifierFlags(member) & ts.ModifierFlags.Private) !== 0 ||
    (member.name !== undefined && ts.isPrivateIdentifier(member.name))
  );
}

/**
 * Check the repository contracts declared in one file.
 */
export function checkRepositoryContracts(
  fileName: string,
  text: string,
  resultTypes: readonly string[],
): ContractProblem[] {
  const source = ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true);
  const accepted = new Set(resultTypes);
  const problems: ContractProblem[] = [];
  const expected = `${resultTypes[0] ?? 'Result'} or Promise<${resultTypes[0] ?? 'Result'}>`;

  const check = (
    owner: string,
    member: ts.ClassElement | ts.TypeElement,
    returnType: ts.TypeNode | undefined,
  ): void => {
    if (returnType && isResultType(returnType, accepted)) return;

    const found = returnType ? `'${returnType.getText(source)}'` : 'no declared return type';
    problems.push({
      line: source.getLineAndCharacterOfPosition(member.getStart(source)).line + 1,
      message: `'${owner}.${memberName(member, source)}' must return ${expected}; found ${found}`,
    });
  };

  const checkTypeElements = (owner: string, members: ts.NodeArray<ts.TypeElement>): void => {
    for (const member of members) {
      if (ts.isMethodSignature(member)) {
        check(owner, member, member.type);
      } else if (ts.isPropertySignature(member) && member.type && ts.isFunctionTypeNode(member.type)) {
        check(owner, member, member.type.type);
      }
    }
  };

  for (const statement of source.statements) {
    if (ts.isInterfaceDeclaration(statement)) {
      checkTypeElements(statement.name.text, statement.members);
    } else if (
      ts.isTypeAliasDeclaration(statement) &&
      ts.isTypeLiteralNode(statement.type)
    ) {
      checkTypeElements(statement.name.text, statement.type.members);
    } else if (
      ts.isClassDeclaration(statement) &&
      statement.name &&
      (ts.getCombinedModifierFlags(statement) & ts.ModifierFlags.Abstract) !== 0
    ) {
      for (const member of statement.members) {
        if (ts.isMethodDeclaration(member) && !isPrivate(member)) {
          check(statement.name.text, member, member.type);
        }
      }
    }
  }

  return problems;
}
