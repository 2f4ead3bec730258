/**
 * Basic usage example.
 */

import {
  ARGUMENTS,
  assertValid,
  encode,
  type GraphInput,
  mutation,
  query,
  simplifyResponseEdges,
  variable,
} from '../../src/index.js';

// A field with child fields
console.log(encode(['viewer', 'login', 'name']));
// viewer{login name}

// Arguments can sit anywhere in the array
const userGraph: GraphInput = [
  'user',
  ARGUMENTS,
  { login: variable('login') },
  'name',
  ['followers', 'totalCount'],
];
assertValid(userGraph, { maxDepth: 5, blockedFields: ['email'] });
console.log(query(['User', [['login', 'String', true]]], userGraph));
// query "User"($login:String!){user(login:$login){name followers{totalCount}}}

// Mutations take the same call shapes
console.log(
  mutation([
    ARGUMENTS,
    { input: { subjectId: variable('id'), body: 'Thanks!' } },
    'addComment',
    ['commentEdge', ['node', 'id']],
  ]),
);
// mutation{addComment(input:{subjectId:$id,body:"Thanks!"}){commentEdge{node{id}}}}

// Responses lose their edges/node wrappers
console.log(
  JSON.stringify(
    simplifyResponseEdges({
      user: { followers: { edges: [{ node: { login: 'a' } }, { node: { login: 'b' } }] } },
    }),
  ),
);
// {"user":{"followers":[{"login":"a"},{"login":"b"}]}}
