import { ILookupSource, LookupSourceId } from '../ILookupSource';
import { Logger } from '../../core/Logger';
import { HttpJsonClient } from '../../http/HttpJsonClient';
import { WikidataSparqlClient } from '../../http/WikidataSparqlClient';
import { PubChemInchikeyLookupSource, PubChemNameLookupSource } from './PubChemLookupSource';
import { WikidataStructureLookupSource } from './WikidataStructureLookupSource';

export * from './PubChemLookupSource';
export * from './WikidataStructureLookupSource';

export interface LookupSourceDeps {
  pubchem: HttpJsonClient;
  sparql: WikidataSparqlClient;
  logger: Logger;
}

/**
 * Instantiate the chain's sources in chain order.
 */
export function createLookupSources(chain: readonly LookupSourceId[], deps: LookupSourceDeps): ILookupSource[] {
  return chain.map((id): ILookupSource => {
    switch (id) {
      case 'pubchem-inchikey':
        return new PubChemInchikeyLookupSource({ http: deps.pubchem, logger: deps.logger });
      case 'pubchem-name':
        return new PubChemNameLookupSource({ http: deps.pubchem, logger: deps.logger });
      case 'wikidata-inchikey':
        return new WikidataStructureLookupSource({ sparql: deps.sparql, logger: deps.logger });
    }
  });
}
